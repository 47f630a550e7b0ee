import request from 'supertest';
import { createTestApp } from './testApp';

describe('Reconciliation Routes', () => {
  const { app } = createTestApp();

  describe('POST /api/v1/reconciliation', () => {
    it('should match each line item', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliation')
        .send({ lineItems: [{ name: '00375', quantity: 2 }, { name: 'абракадабра' }] });

      expect(response.status).toBe(200);
      expect(response.body.data.lines).toEqual([
        {
          lineIndex: 0,
          lineText: '00375',
          match: { id: 'i-pomegranate', name: 'Гранат', code: '00375', score: 100, source: 'search' },
        },
        { lineIndex: 1, lineText: 'абракадабра', match: null },
      ]);
    });

    it('should reject an empty list', async () => {
      const response = await request(app).post('/api/v1/reconciliation').send({ lineItems: [] });

      expect(response.status).toBe(400);
      expect(response.body.error).toMatch(/^Validation failed/);
    });

    it('should reject blank names', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliation')
        .send({ lineItems: [{ name: '  ' }] });

      expect(response.status).toBe(400);
    });
  });
});
