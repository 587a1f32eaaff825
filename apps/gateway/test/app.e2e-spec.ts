import { INestApplication } from '@nestjs/common';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import { TerminusModule } from '@nestjs/terminus';
import request from 'supertest';
import { App } from 'supertest/types';
import { BatchStatus, SentimentLabel } from '@app/shared-types';
import {
  SurveyRowsFactory,
  TestingModuleMocks,
  createTestingModule,
} from '@app/testing';
import { CoursesController } from '../src/controllers/courses.controller';
import { LecturesController } from '../src/controllers/lectures.controller';
import { UploadsController } from '../src/controllers/uploads.controller';
import { HttpExceptionFilter } from '../src/filters/http-exception.filter';
import { HealthController } from '../src/health/health.controller';
import { CorrelationIdInterceptor } from '../src/interceptors/correlation-id.interceptor';
import { createValidationPipe } from '../src/pipes/validation.pipe';
import { UploadsService } from '../src/services/uploads.service';
import { buildSurveyCsv, buildThreeRowSurvey } from '../../../test/fixtures';

describe('Gateway API (e2e)', () => {
  let app: INestApplication;
  let mocks: TestingModuleMocks;

  const unknownId = '123e4567-e89b-12d3-a456-426614174999';

  beforeEach(async () => {
    const compiled = await createTestingModule({
      imports: [TerminusModule],
      controllers: [
        UploadsController,
        LecturesController,
        CoursesController,
        HealthController,
      ],
      providers: [
        UploadsService,
        { provide: APP_FILTER, useClass: HttpExceptionFilter },
        { provide: APP_INTERCEPTOR, useClass: CorrelationIdInterceptor },
      ],
      compile: true,
    });
    mocks = compiled.mocks;

    app = compiled.module.createNestApplication();
    // Same pipe as main.ts
    app.useGlobalPipes(createValidationPipe());
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  function server(): App {
    return app.getHttpServer() as App;
  }

  function postSurvey(
    fields: Record<string, string> = {},
    file: Buffer | null = buildThreeRowSurvey(),
  ) {
    const req = request(server()).post('/api/uploads');
    const merged: Record<string, string> = {
      courseName: 'Data Science',
      lectureDate: '2024-05-01',
      lectureNumber: '1',
      ...fields,
    };
    for (const [name, value] of Object.entries(merged)) {
      req.field(name, value);
    }
    if (file) {
      req.attach('file', file, 'survey.csv');
    }
    return req;
  }

  describe('POST /api/uploads', () => {
    it('should accept a valid survey and echo the correlation id', async () => {
      const response = await postSurvey()
        .set('x-correlation-id', 'e2e-1')
        .expect(201);

      expect(response.headers['x-correlation-id']).toBe('e2e-1');
      expect(response.body.message).toBe('Upload accepted; analysis has been queued.');
      expect(response.body.status_url).toBe(
        `/api/uploads/${response.body.file_id}/status`,
      );
      expect(mocks.rabbitmq.emit).toHaveBeenCalledTimes(1);
    });

    it('should answer 409 for a second upload of the same lecture', async () => {
      const first = await postSurvey().expect(201);

      const second = await postSurvey()
        .set('x-correlation-id', 'e2e-2')
        .expect(409);

      expect(second.body).toMatchObject({
        statusCode: 409,
        path: '/api/uploads',
        method: 'POST',
        message: `Survey batch already exists for this lecture (id: ${first.body.file_id})`,
        correlationId: 'e2e-2',
      });
    });

    it('should list validation errors for bad metadata', async () => {
      const response = await postSurvey({
        courseName: '',
        lectureDate: '2024-13-01',
        lectureNumber: '0',
      }).expect(400);

      expect(response.body.message).toBe('Bad Request');
      expect(response.body.errors).toEqual(
        expect.arrayContaining([
          'courseName is required',
          'lectureDate must be a valid date',
          'lectureNumber must not be less than 1',
        ]),
      );
    });

    it('should reject a whitespace-only course name', async () => {
      const response = await postSurvey({ courseName: '   ' }).expect(400);

      expect(response.body.errors).toEqual(['courseName is required']);
      expect(mocks.repositories.store.batches.size).toBe(0);
    });

    it('should reject a request without a file', async () => {
      const response = await postSurvey({}, null).expect(400);

      expect(response.body.message).toBe('Uploaded file is empty.');
    });

    it('should reject a CSV with duplicate headers', async () => {
      const response = await postSurvey(
        {},
        buildSurveyCsv(['colA', 'colA'], [['1', '2']]),
      ).expect(400);

      expect(response.body.message).toBe(
        'Header contains duplicate column names after normalization.',
      );
      expect(mocks.storage.blobs.size).toBe(0);
    });
  });

  describe('batch resources', () => {
    it('should report the status of a queued batch', async () => {
      const created = await postSurvey().expect(201);

      const response = await request(server())
        .get(`/api/uploads/${created.body.file_id}/status`)
        .expect(200);

      expect(response.body).toMatchObject({
        file_id: created.body.file_id,
        status: BatchStatus.QUEUED,
        course_name: 'Data Science',
        lecture_number: 1,
        batch_type: 'preliminary',
      });
    });

    it('should answer 404 for an unknown batch and 400 for a malformed id', async () => {
      await request(server()).get(`/api/uploads/${unknownId}/status`).expect(404);
      await request(server()).get('/api/uploads/not-a-uuid/status').expect(400);
    });

    it('should delete a batch', async () => {
      const created = await postSurvey().expect(201);

      await request(server()).delete(`/api/uploads/${created.body.file_id}`).expect(204);
      await request(server())
        .get(`/api/uploads/${created.body.file_id}/status`)
        .expect(404);
      expect(mocks.storage.blobs.size).toBe(0);
    });

    it('should queue a summary recompute', async () => {
      const created = await postSurvey().expect(201);

      await request(server())
        .post(`/api/uploads/${created.body.file_id}/summary/recompute`)
        .expect(202);

      expect(mocks.rabbitmq.emit).toHaveBeenLastCalledWith(
        'summary.recompute',
        expect.objectContaining({ batchId: created.body.file_id }),
        expect.objectContaining({ correlationId: expect.any(String) }),
      );
    });
  });

  describe('GET /api/lectures/effective', () => {
    it('should return the batch representing the lecture', async () => {
      const created = await postSurvey().expect(201);

      const response = await request(server())
        .get('/api/lectures/effective')
        .query({ courseName: 'Data Science', lectureNumber: '1' })
        .expect(200);

      expect(response.body.batch.file_id).toBe(created.body.file_id);
      expect(response.body.summary.survey).toBeNull();
    });

    it('should answer 404 when the lecture has no batch', async () => {
      await request(server())
        .get('/api/lectures/effective')
        .query({ courseName: 'Data Science', lectureNumber: '3' })
        .expect(404);
    });
  });

  describe('comment listings', () => {
    it('should list the negative comments of a batch', async () => {
      const created = await postSurvey().expect(201);
      const batchId: string = created.body.file_id;
      const negative = SurveyRowsFactory.comment(batchId, {
        sentiment: SentimentLabel.NEGATIVE,
        commentText: '資料が見づらい',
      });
      const neutral = SurveyRowsFactory.comment(batchId);
      mocks.repositories.store.comments.set(negative.id, negative);
      mocks.repositories.store.comments.set(neutral.id, neutral);

      const response = await request(server())
        .get(`/api/uploads/${batchId}/comments`)
        .query({ sentiment: 'negative', limit: '10' })
        .expect(200);

      expect(response.body).toHaveLength(1);
      expect(response.body[0]).toMatchObject({
        comment_id: negative.id,
        file_id: batchId,
        sentiment: 'negative',
        comment_text: '資料が見づらい',
      });
    });

    it('should reject an out-of-range page size', async () => {
      const created = await postSurvey().expect(201);

      const response = await request(server())
        .get(`/api/uploads/${created.body.file_id}/comments`)
        .query({ limit: '501' })
        .expect(400);

      expect(response.body.errors).toEqual(['limit must not be greater than 500']);
    });

    it('should list comments by course name', async () => {
      const created = await postSurvey().expect(201);
      const comment = SurveyRowsFactory.comment(created.body.file_id);
      mocks.repositories.store.comments.set(comment.id, comment);

      const response = await request(server())
        .get('/api/courses/Data%20Science/comments')
        .expect(200);

      expect(response.body.map((row: { comment_id: string }) => row.comment_id)).toEqual([
        comment.id,
      ]);
    });
  });

  describe('GET /health/ready', () => {
    it('should be ready with database and broker connected', async () => {
      const response = await request(server()).get('/health/ready').expect(200);

      expect(response.body).toMatchObject({ status: 'ready', service: 'gateway' });
    });
  });
});
