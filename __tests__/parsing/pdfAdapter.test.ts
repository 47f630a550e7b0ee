import { pdfAdapter } from '../../src/parsing/adapters/pdfAdapter';
import { extractLineItems } from '../../src/parsing/tableExtractor';
import { MalformedDocumentError } from '../../src/utils/errors';

// pdf2json stand-in: the buffer holds the JSON payload the real parser would emit
jest.mock('pdf2json', () => {
  const { EventEmitter } = jest.requireActual<typeof import('events')>('events');

  class MockPdfParser extends EventEmitter {
    parseBuffer(buffer: Buffer): void {
      setImmediate(() => {
        const text = buffer.toString('utf8');
        if (text === 'broken') {
          this.emit('pdfParser_dataError', { parserError: new Error('Invalid PDF structure') });
          return;
        }
        this.emit('pdfParser_dataReady', JSON.parse(text));
      });
    }
  }

  return { __esModule: true, default: MockPdfParser };
});

interface FakeRun {
  x: number;
  y: number;
  text: string;
}

const pdfPayload = (pages: FakeRun[][]): Buffer =>
  Buffer.from(
    JSON.stringify({
      Pages: pages.map((runs) => ({
        Texts: runs.map((run) => ({ x: run.x, y: run.y, R: [{ T: encodeURIComponent(run.text) }] })),
      })),
    })
  );

const cellsAt = (y: number, cells: string[]): FakeRun[] =>
  cells.map((text, index) => ({ x: 1 + index * 2, y, text }));

describe('PDF Adapter', () => {
  it('should lay out pages as tables and find the seller', async () => {
    const buffer = pdfPayload([
      [
        { x: 1, y: 1, text: 'Продавец: ООО "Ромашка", ИНН 7701234567' },
        ...cellsAt(3, ['№', 'Наименование товара', 'Код', 'Ед. изм.', 'Количество', 'Цена']),
        ...cellsAt(4, ['1', 'Авокадо Хасс', '00412', 'кг', '2,5', '450']),
        ...cellsAt(5, ['2', 'Гранат', '00375', 'шт', '10', '120']),
      ],
    ]);

    const output = await pdfAdapter.parse(buffer);

    expect(output.supplierName).toBe('ООО Ромашка');
    expect(output.pages).toHaveLength(1);
    expect(extractLineItems(output.pages, pdfAdapter.profile).lineItems).toEqual([
      { name: 'Авокадо Хасс', unit: 'kg', quantity: 2.5, unitPriceWithTax: 450, sourceCode: '00412' },
      { name: 'Гранат', unit: 'piece', quantity: 10, unitPriceWithTax: 120, sourceCode: '00375' },
    ]);
  });

  it('should return a page without tables for an empty page', async () => {
    const output = await pdfAdapter.parse(pdfPayload([[]]));

    expect(output).toEqual({ pages: [[]], supplierName: null });
  });

  it('should only look for the seller on the first page', async () => {
    const output = await pdfAdapter.parse(
      pdfPayload([[{ x: 1, y: 1, text: 'Счёт на оплату' }], [{ x: 1, y: 1, text: 'Продавец: ООО Ромашка' }]])
    );

    expect(output.supplierName).toBeNull();
    expect(output.pages).toHaveLength(2);
  });

  it('should reject unreadable documents', async () => {
    const promise = pdfAdapter.parse(Buffer.from('broken'));

    await expect(promise).rejects.toBeInstanceOf(MalformedDocumentError);
    await expect(promise).rejects.toThrow('Unable to read PDF: Invalid PDF structure');
  });
});
