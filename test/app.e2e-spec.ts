import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, Logger } from '@nestjs/common';
import request from 'supertest';
import { App } from 'supertest/types';
import { AppModule } from './../src/app.module';

describe('Credibility API (e2e)', () => {
  let app: INestApplication<App>;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    jest.restoreAllMocks();
  });

  it('/health (GET)', () => {
    return request(app.getHttpServer()).get('/health').expect(200).expect({
      status: 'ok',
      service: 'media-credibility-engine',
    });
  });

  it('/ (GET)', () => {
    return request(app.getHttpServer()).get('/').expect(200).expect({
      service: 'media-credibility-engine',
      version: '1.0.0',
    });
  });

  it('/ideology/topics (GET)', () => {
    return request(app.getHttpServer())
      .get('/ideology/topics')
      .expect(200)
      .expect((res) => {
        const body = res.body as { id: string }[];
        expect(body).toHaveLength(14);
        expect(body[7].id).toBe('social.abortion');
      });
  });

  it('/credibility/report (POST)', () => {
    return request(app.getHttpServer())
      .post('/credibility/report')
      .send({
        outlet: 'Example Daily',
        ideology: {
          answers: {
            'economic.ownership': {
              relevant: true,
              stance: 'left',
              confirmed: ['economic.ownership.left.4'],
            },
            'social.abortion': {
              relevant: true,
              stance: 'left',
              confirmed: ['social.abortion.left.4'],
            },
          },
        },
        bias: { newsReportingBalance: -1.8, editorialBias: -2.1 },
        factuality: {
          factCheck: 1,
          sourcing: 1.5,
          transparency: 0,
          propaganda: 3,
        },
        traffic: 'High',
        siteAgeYears: 25,
        freedom: 'Free',
        timeoutMs: 0,
      })
      .expect(200)
      .expect((res) => {
        const body = res.body as {
          bias: { score: number; label: string };
          factuality: { score: number; label: string };
          credibility: { points: number; level: string };
        };
        expect(body.bias).toMatchObject({ score: -2.34, label: 'Left-Center' });
        expect(body.factuality).toMatchObject({ score: 1.08, label: 'High' });
        expect(body.credibility).toMatchObject({
          points: 8,
          level: 'High Credibility',
        });
      });
  });

  it('/credibility/report (POST) rejects an invalid body', () => {
    return request(app.getHttpServer())
      .post('/credibility/report')
      .send({ outlet: 'Example Daily' })
      .expect(400);
  });

  it('/evaluation (POST)', () => {
    return request(app.getHttpServer())
      .post('/evaluation')
      .send({
        entries: [
          {
            name: 'alpha',
            predicted: { bias: 'Left', factuality: 'High' },
            reference: { bias: 'LEFT-CENTER', factuality: 'HIGH' },
          },
        ],
      })
      .expect(200)
      .expect((res) => {
        const body = res.body as { biasMae: number; factualityMae: number };
        expect(body.biasMae).toBe(1);
        expect(body.factualityMae).toBe(0);
      });
  });
});
