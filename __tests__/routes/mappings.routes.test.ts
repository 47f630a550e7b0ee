import request from 'supertest';
import { createTestApp } from './testApp';

describe('Mapping Routes', () => {
  describe('POST /api/v1/mappings', () => {
    it('should confirm a mapping', async () => {
      const { app, mappings } = createTestApp();

      const response = await request(app)
        .post('/api/v1/mappings')
        .send({ lineText: 'Гранат  спелый', itemId: 'i-pomegranate' });

      expect(response.status).toBe(201);
      expect(response.body.message).toBe('Mapping saved');
      expect(response.body.data).toEqual({
        key: 'Гранат спелый',
        mapping: { id: 'i-pomegranate', name: 'Гранат', code: '00375' },
        persisted: true,
      });
      expect(mappings.size).toBe(1);
    });

    it('should reject categories', async () => {
      const { app } = createTestApp();

      const response = await request(app).post('/api/v1/mappings').send({ lineText: 'Кухня', itemId: 'g-food' });

      expect(response.status).toBe(422);
      expect(response.body.kind).toBe('InvalidMatchTarget');
    });

    it('should reject unknown items', async () => {
      const { app } = createTestApp();

      const response = await request(app).post('/api/v1/mappings').send({ lineText: 'Гранат', itemId: 'i-missing' });

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('Catalog item i-missing not found');
    });

    it('should validate the body', async () => {
      const { app } = createTestApp();

      const response = await request(app).post('/api/v1/mappings').send({ lineText: 'Гранат' });

      expect(response.status).toBe(400);
    });
  });

  describe('GET and DELETE /api/v1/mappings', () => {
    it('should look up and forget a mapping', async () => {
      const { app } = createTestApp();
      await request(app).post('/api/v1/mappings').send({ lineText: 'Нори листы', itemId: 'i-nori' });

      const found = await request(app).get('/api/v1/mappings').query({ key: ' Нори   листы ' });
      expect(found.status).toBe(200);
      expect(found.body.data).toEqual({
        key: 'Нори листы',
        mapping: { id: 'i-nori', name: 'Нори листы', code: '40001' },
      });

      const removed = await request(app).delete('/api/v1/mappings').query({ key: 'Нори листы' });
      expect(removed.status).toBe(200);
      expect(removed.body.message).toBe('Mapping removed');

      const missing = await request(app).get('/api/v1/mappings').query({ key: 'Нори листы' });
      expect(missing.status).toBe(404);
      expect(missing.body.error).toBe('No mapping stored for "Нори листы"');
    });

    it('should use a confirmed mapping when reconciling', async () => {
      const { app } = createTestApp();
      await request(app).post('/api/v1/mappings').send({ lineText: 'Авокадо спелое', itemId: 'i-avocado' });

      const response = await request(app)
        .post('/api/v1/reconciliation')
        .send({ lineItems: [{ name: 'Авокадо спелое' }] });

      expect(response.body.data.lines[0].match).toMatchObject({ id: 'i-avocado', source: 'learned' });
    });
  });
});
