/**
 * Integration Tests — Collections & Aliases Endpoints
 *
 * Full HTTP lifecycle through the real middleware chain, controller and
 * CollectionsService, with the coordinator swapped for a jest.fn() stub in
 * the DI container. This checks the wiring (route → controller → service →
 * coordinator interface), status codes and body shapes without PostgreSQL.
 *
 * The app is built INSIDE `beforeAll`, after the override: controllers
 * resolve CollectionsService (and through it the coordinator) when the route
 * modules load, so the stub must be registered first.
 */
import { TOKENS } from '@core/types';
import type { ICoordinatorClient } from '@domain/interfaces/ICoordinatorClient';
import { CoordinatorError } from '@shared/errors/CoordinatorError';
import type { Express } from 'express';
import request from 'supertest';
import { container } from 'tsyringe';

import { sampleCollectionInfo } from '../helpers/fixtures';
import { createMockCoordinator, MockCoordinator } from '../helpers/mockCoordinator';

let app: Express;
let coordinator: MockCoordinator;

beforeAll(async () => {
  await import('@core/container');

  coordinator = createMockCoordinator();
  container.register<ICoordinatorClient>(TOKENS.CoordinatorClient, { useValue: coordinator });

  const { createApp } = await import('@interfaces/http/app');
  app = createApp();
});

afterEach(() => {
  jest.clearAllMocks();
});

describe('PUT /api/v1/collections/:name', () => {
  it('should create the collection and report result and time', async () => {
    coordinator.submit.mockResolvedValue(true);

    const res = await request(app)
      .put('/api/v1/collections/articles?timeout=10')
      .send({ vectors: { size: 4, distance: 'Dot' }, shardNumber: 2 });

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('success');
    expect(res.body.result).toBe(true);
    expect(typeof res.body.time).toBe('number');
    expect(coordinator.submit).toHaveBeenCalledWith(
      {
        kind: 'CreateCollection',
        collectionName: 'articles',
        config: {
          vectors: { size: 4, distance: 'Dot' },
          params: { shardNumber: 2 },
          hnswConfig: {},
          optimizersConfig: {},
        },
      },
      { seconds: 10 },
    );
  });

  it('should pass no timeout when the query has none', async () => {
    coordinator.submit.mockResolvedValue(true);

    await request(app)
      .put('/api/v1/collections/articles')
      .send({ vectors: { size: 4, distance: 'Dot' } });

    expect(coordinator.submit.mock.calls[0][1]).toBeUndefined();
  });

  it('should return 400 without reaching the coordinator when vectors are missing', async () => {
    const res = await request(app).put('/api/v1/collections/articles').send({ shardNumber: 1 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      status: 'error',
      message: 'Collection `articles` must define vectors',
    });
    expect(coordinator.submit).not.toHaveBeenCalled();
  });

  it('should return 400 for a negative timeout', async () => {
    const res = await request(app)
      .put('/api/v1/collections/articles?timeout=-1')
      .send({ vectors: { size: 4, distance: 'Dot' } });

    expect(res.status).toBe(400);
    expect(res.body.status).toBe('error');
    expect(coordinator.submit).not.toHaveBeenCalled();
  });

  it('should treat an empty timeout as no timeout', async () => {
    coordinator.submit.mockResolvedValue(true);

    const res = await request(app).delete('/api/v1/collections/articles?timeout=');

    expect(res.status).toBe(200);
    expect(coordinator.submit).toHaveBeenCalledWith(
      { kind: 'DeleteCollection', collectionName: 'articles' },
      undefined,
    );
  });

  it('should return 400 for a body that is not valid JSON', async () => {
    const res = await request(app)
      .put('/api/v1/collections/articles')
      .set('Content-Type', 'application/json')
      .send('{"vectors":');

    expect(res.status).toBe(400);
    expect(coordinator.submit).not.toHaveBeenCalled();
  });

  it('should return 409 when the coordinator reports the collection exists', async () => {
    coordinator.submit.mockRejectedValue(CoordinatorError.alreadyExists('Collection `articles`'));

    const res = await request(app)
      .put('/api/v1/collections/articles')
      .send({ vectors: { size: 4, distance: 'Dot' } });

    expect(res.status).toBe(409);
    expect(res.body.message).toBe('Collection `articles` already exists!');
  });

  it('should return 504 when the coordinator times out', async () => {
    coordinator.submit.mockRejectedValue(CoordinatorError.timeout(1, 'CreateCollection'));

    const res = await request(app)
      .put('/api/v1/collections/articles?timeout=1')
      .send({ vectors: { size: 4, distance: 'Dot' } });

    expect(res.status).toBe(504);
    expect(res.body.message).toBe('Timeout of 1s reached while waiting for CreateCollection');
  });

  it('should hide internal coordinator failures behind a generic 500', async () => {
    coordinator.submit.mockRejectedValue(new CoordinatorError('internal', 'relation does not exist'));

    const res = await request(app)
      .put('/api/v1/collections/articles')
      .send({ vectors: { size: 4, distance: 'Dot' } });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ status: 'error', message: 'Internal server error' });
  });
});

describe('PATCH /api/v1/collections/:name', () => {
  it('should submit an UpdateCollection diff', async () => {
    coordinator.submit.mockResolvedValue(true);

    const res = await request(app)
      .patch('/api/v1/collections/articles?timeout=4')
      .send({ params: { replicationFactor: 2 } });

    expect(res.status).toBe(200);
    expect(coordinator.submit).toHaveBeenCalledWith(
      {
        kind: 'UpdateCollection',
        collectionName: 'articles',
        diff: { params: { replicationFactor: 2 } },
      },
      { seconds: 4 },
    );
  });

  it('should return 404 when the collection does not exist', async () => {
    coordinator.submit.mockRejectedValue(
      CoordinatorError.notFound("Collection `articles` doesn't exist"),
    );

    const res = await request(app)
      .patch('/api/v1/collections/articles')
      .send({ hnswConfig: { m: 32 } });

    expect(res.status).toBe(404);
    expect(res.body.message).toBe("Not found: Collection `articles` doesn't exist");
  });
});

describe('DELETE /api/v1/collections/:name', () => {
  it('should submit a DeleteCollection operation with the timeout', async () => {
    coordinator.submit.mockResolvedValue(false);

    const res = await request(app).delete('/api/v1/collections/articles?timeout=3');

    expect(res.status).toBe(200);
    expect(res.body.result).toBe(false);
    expect(coordinator.submit).toHaveBeenCalledWith(
      { kind: 'DeleteCollection', collectionName: 'articles' },
      { seconds: 3 },
    );
  });
});

describe('POST /api/v1/collections/aliases', () => {
  it('should submit the alias actions in order', async () => {
    coordinator.submit.mockResolvedValue(true);

    const res = await request(app)
      .post('/api/v1/collections/aliases')
      .send({
        actions: [
          { createAlias: { collectionName: 'articles', aliasName: 'live' } },
          { deleteAlias: { aliasName: 'stale' } },
        ],
      });

    expect(res.status).toBe(200);
    expect(coordinator.submit).toHaveBeenCalledWith(
      {
        kind: 'ChangeAliases',
        actions: [
          { kind: 'CreateAlias', collectionName: 'articles', aliasName: 'live' },
          { kind: 'DeleteAlias', aliasName: 'stale' },
        ],
      },
      undefined,
    );
  });

  it('should return 400 for an action that names no operation', async () => {
    const res = await request(app)
      .post('/api/v1/collections/aliases')
      .send({ actions: [{}] });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Malformed AliasOperation type at actions[0]');
    expect(coordinator.submit).not.toHaveBeenCalled();
  });

  it('should return 400 when actions is missing', async () => {
    const res = await request(app).post('/api/v1/collections/aliases').send({});

    expect(res.status).toBe(400);
    expect(coordinator.submit).not.toHaveBeenCalled();
  });
});

describe('GET /api/v1/collections', () => {
  it('should list collections with a time', async () => {
    coordinator.listCollections.mockResolvedValue([{ name: 'articles' }, { name: 'media' }]);

    const res = await request(app).get('/api/v1/collections');

    expect(res.status).toBe(200);
    expect(res.body.collections).toEqual([{ name: 'articles' }, { name: 'media' }]);
    expect(res.body.time).toBeGreaterThanOrEqual(0);
  });
});

describe('GET /api/v1/collections/:name', () => {
  it('should return the collection info', async () => {
    coordinator.getCollectionInfo.mockResolvedValue(sampleCollectionInfo);

    const res = await request(app).get('/api/v1/collections/articles');

    expect(res.status).toBe(200);
    expect(res.body.result).toEqual(sampleCollectionInfo);
    expect(coordinator.getCollectionInfo).toHaveBeenCalledWith('articles');
  });

  it('should return 503 when the coordinator is unavailable', async () => {
    coordinator.getCollectionInfo.mockRejectedValue(
      new CoordinatorError('unavailable', 'connect ECONNREFUSED 127.0.0.1:5432'),
    );

    const res = await request(app).get('/api/v1/collections/articles');

    expect(res.status).toBe(503);
  });
});

describe('GET /api/v1/aliases', () => {
  it('should list every alias with its collection', async () => {
    coordinator.listAliases.mockResolvedValue([{ aliasName: 'live', collectionName: 'articles' }]);

    const res = await request(app).get('/api/v1/aliases');

    expect(res.status).toBe(200);
    expect(res.body.aliases).toEqual([{ aliasName: 'live', collectionName: 'articles' }]);
  });
});

describe('GET /api/v1/collections/:name/aliases', () => {
  it('should pair every alias with the requested collection name', async () => {
    coordinator.collectionAliases.mockResolvedValue(['a', 'b']);

    const res = await request(app).get('/api/v1/collections/foo/aliases');

    expect(res.status).toBe(200);
    expect(res.body.aliases).toEqual([
      { aliasName: 'a', collectionName: 'foo' },
      { aliasName: 'b', collectionName: 'foo' },
    ]);
    expect(coordinator.submit).not.toHaveBeenCalled();
  });
});
