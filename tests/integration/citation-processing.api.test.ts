/**
 * Citation Processing API Tests
 *
 * Drives the Express app in process with supertest.
 */
import { describe, it, expect } from 'vitest';
import request from 'supertest';
import JSZip from 'jszip';
import * as cheerio from 'cheerio';
import { createApp } from '../../src/app';

const app = createApp();

const TEXT = [String.raw`See \cite{b} and \cite{a}.`, String.raw`\bibitem{a} Text A`, String.raw`\bibitem{b} Text B`].join('\n');

const createPackage = async (body: string): Promise<Buffer> => {
  const zip = new JSZip();
  zip.file(
    'index.xml',
    '<sl:document xmlns:sl="http://developer.apple.com/namespaces/sl" xmlns:sf="http://developer.apple.com/namespaces/sf">' +
      `<sf:anon-styles/><sf:text-body>${body}</sf:text-body></sl:document>`
  );
  return zip.generateAsync({ type: 'nodebuffer' });
};

describe('Citation Processing API', () => {
  describe('GET /health', () => {
    it('should return healthy status', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
    });
  });

  describe('GET /api/v1', () => {
    it('should list the citation endpoints', async () => {
      const response = await request(app).get('/api/v1');

      expect(response.status).toBe(200);
      expect(response.body.endpoints.citations).toEqual({
        process: 'POST /api/v1/citations/process',
        processText: 'POST /api/v1/citations/process-text',
      });
    });
  });

  describe('POST /api/v1/citations/process-text', () => {
    it('should number citations with the default options', async () => {
      const response = await request(app).post('/api/v1/citations/process-text').send({ text: TEXT });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        data: {
          text: ['See [1] and [2].', '1. Text B', '2. Text A'].join('\n'),
          citationCount: 2,
          referenceCount: 2,
          order: [
            { label: 'b', index: 1 },
            { label: 'a', index: 2 },
          ],
        },
      });
    });

    it('should honour the requested styles and ordering', async () => {
      const response = await request(app).post('/api/v1/citations/process-text').send({
        text: TEXT,
        citationStyle: 'parens',
        referenceStyle: 'square-brace',
        orderBy: 'reference-first',
      });

      expect(response.status).toBe(200);
      expect(response.body.data.text).toBe(['See (2) and (1).', '[1] Text A', '[2] Text B'].join('\n'));
    });

    it('should reject an unsupported style', async () => {
      const response = await request(app)
        .post('/api/v1/citations/process-text')
        .send({ text: TEXT, citationStyle: 'footnote' });

      expect(response.status).toBe(400);
      expect(response.body.success).toBe(false);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.details[0].field).toBe('citationStyle');
    });

    it('should report missing references with their labels', async () => {
      const response = await request(app)
        .post('/api/v1/citations/process-text')
        .send({ text: String.raw`\cite{x}` });

      expect(response.status).toBe(422);
      expect(response.body.error.code).toBe('CITATION_MISSING_REFERENCE');
      expect(response.body.error.details).toEqual({ labels: ['x'] });
    });

    it('should report uncited references with their labels', async () => {
      const response = await request(app)
        .post('/api/v1/citations/process-text')
        .send({ text: [String.raw`\cite{a}`, String.raw`\bibitem{a} A`, String.raw`\bibitem{z} Z`].join('\n') });

      expect(response.status).toBe(422);
      expect(response.body.error.code).toBe('CITATION_UNCITED_REFERENCE');
      expect(response.body.error.details).toEqual({ labels: ['z'] });
    });

    it('should report duplicate references', async () => {
      const response = await request(app)
        .post('/api/v1/citations/process-text')
        .send({ text: [String.raw`\cite{a}`, String.raw`\bibitem{a} A`, String.raw`\bibitem{a} B`].join('\n') });

      expect(response.status).toBe(422);
      expect(response.body.error.code).toBe('CITATION_DUPLICATE_REFERENCE');
      expect(response.body.error.details).toEqual({ labels: ['a'] });
    });
  });

  describe('POST /api/v1/citations/process', () => {
    it('should return the rewritten package', async () => {
      const body = String.raw`<sf:p>See \cite{b} and \cite{a}.</sf:p><sf:p>\bibitem{a} Text A</sf:p><sf:p>\bibitem{b} Text B</sf:p>`;

      const response = await request(app)
        .post('/api/v1/citations/process')
        .field('orderBy', 'reference-first')
        .attach('file', await createPackage(body), { filename: 'paper.pages', contentType: 'application/zip' })
        .responseType('blob');

      expect(response.status).toBe(200);
      expect(response.headers['content-disposition']).toBe('attachment; filename="paper-cited.pages"');
      expect(JSON.parse(response.headers['x-citation-summary'])).toEqual({
        citationCount: 2,
        referenceCount: 2,
        order: [
          { label: 'a', index: 1 },
          { label: 'b', index: 2 },
        ],
      });

      const zip = await JSZip.loadAsync(response.body);
      const $ = cheerio.load((await zip.file('index.xml')?.async('text')) ?? '', { xmlMode: true });
      expect($('sf\\:p').toArray().map((node) => $(node).text())).toEqual([
        'See [2] and [1].',
        '1. Text A',
        '2. Text B',
      ]);
    });

    it('should reject an unsupported ordering sent with the upload', async () => {
      const body = String.raw`<sf:p>\cite{a}</sf:p><sf:p>\bibitem{a} Text A</sf:p>`;

      const response = await request(app)
        .post('/api/v1/citations/process')
        .field('orderBy', 'alphabetical')
        .attach('file', await createPackage(body), { filename: 'paper.pages', contentType: 'application/zip' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.details).toHaveLength(1);
      expect(response.body.error.details[0].field).toBe('orderBy');
      expect(response.body.error.details[0].code).toBe('invalid_enum_value');
    });

    it('should require a file', async () => {
      const response = await request(app).post('/api/v1/citations/process');

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('FILE_MISSING');
    });

    it('should reject files that are not Pages packages', async () => {
      const response = await request(app)
        .post('/api/v1/citations/process')
        .attach('file', Buffer.from('plain text'), { filename: 'notes.txt', contentType: 'text/plain' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('FILE_INVALID_TYPE');
    });

    it('should reject a corrupt package', async () => {
      const response = await request(app)
        .post('/api/v1/citations/process')
        .attach('file', Buffer.from('not a zip'), { filename: 'broken.pages', contentType: 'application/zip' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('PAGES_INVALID_DOCUMENT');
    });
  });

  it('should answer unknown routes with 404', async () => {
    const response = await request(app).get('/api/v1/unknown');

    expect(response.status).toBe(404);
    expect(response.body.error.code).toBe('NOT_FOUND');
  });
});
