import { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { DEFAULT_SETUP_OPTIONS, configureApp } from '../src/app.setup';
import * as htmlOptimizer from '../src/seo-optimizer/html-optimizer';

describe('Blog SEO Optimizer API (e2e)', () => {
  let app: NestExpressApplication;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile();
    app = moduleRef.createNestApplication<NestExpressApplication>({ logger: false });
    configureApp(app, DEFAULT_SETUP_OPTIONS);
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('GET /api reports the service', async () => {
    const response = await request(app.getHttpServer()).get('/api').expect(200);
    expect(response.body).toEqual({
      message: 'Blog SEO Optimizer API',
      version: '1.0.0',
      status: 'running',
    });
  });

  it('GET /api/health', async () => {
    const response = await request(app.getHttpServer()).get('/api/health').expect(200);
    expect(response.body).toEqual({
      status: 'healthy',
      service: 'Blog SEO Optimizer API',
      version: '1.0.0',
    });
  });

  it('GET /api/features lists the optimizations', async () => {
    const response = await request(app.getHttpServer()).get('/api/features').expect(200);
    expect(response.body.features).toHaveLength(6);
    expect(response.body.features[0].name).toBe('Title Tag Optimization');
  });

  it('POST /api/optimize rewrites the content', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/optimize')
      .send({
        html_code: '<h1>Test</h1><p>Short content about testing.</p>',
        focus_keyword: 'testing',
        seo_score: 65,
      })
      .expect(200);

    const { success, data } = response.body;
    expect(success).toBe(true);
    expect(data.seo_score_before).toBe(65);
    expect(data.seo_score_after).toBe(85);
    expect(data.improvement).toBe(20);
    expect(data.title_length).toBe(57);
    expect(data.meta_length).toBe(156);
    expect(data.optimizations).toContain('Added 3 H2 headings');
    expect(data.optimized_html_wordpress).toContain(
      '<title>Test - testing - Complete Guide - Tips and Best Practices</title>',
    );
  });

  it.each([
    [{ focus_keyword: 'testing', seo_score: 65 }, 'Missing required field: html_code'],
    [{ html_code: '<p>x</p>', focus_keyword: '', seo_score: 65 }, 'Missing required field: focus_keyword'],
    [{ html_code: '<p>x</p>', focus_keyword: 'testing' }, 'Missing required field: seo_score'],
    [{ html_code: '<p>x</p>', focus_keyword: 'testing', seo_score: 150 }, 'Invalid value for field: seo_score'],
    [{ html_code: '<p>x</p>', focus_keyword: 'testing', seo_score: true }, 'Invalid value for field: seo_score'],
    [{ html_code: 123, focus_keyword: 'testing', seo_score: 65 }, 'Invalid value for field: html_code'],
  ])('POST /api/optimize rejects %j', async (body, error) => {
    const response = await request(app.getHttpServer())
      .post('/api/optimize')
      .send(body)
      .expect(400);
    expect(response.body).toEqual({ success: false, error });
  });

  it('POST /api/optimize reports optimization failures', async () => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    jest.spyOn(htmlOptimizer, 'optimizeHtml').mockImplementation(() => {
      throw new Error('parser exploded');
    });

    const response = await request(app.getHttpServer())
      .post('/api/optimize')
      .send({ html_code: '<p>Unique failing body</p>', focus_keyword: 'failure', seo_score: 10 })
      .expect(500);
    expect(response.body).toEqual({ success: false, error: 'Optimization failed' });
  });

  it('unknown routes use the error envelope', async () => {
    const response = await request(app.getHttpServer()).get('/api/missing').expect(404);
    expect(response.body).toEqual({ success: false, error: 'Cannot GET /api/missing' });
  });
});
