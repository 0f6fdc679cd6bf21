import request from 'supertest';
import JSZip from 'jszip';
import { createApp } from '../../src/app';
import PhaseOrchestrator from '../../src/services/phaseOrchestrator';
import StoryAgents from '../../src/services/storyAgents';
import ExportService from '../../src/services/exportService';
import RetryPolicy from '../../src/utils/retryPolicy';
import InMemoryProjectRepository from '../helpers/inMemoryRepository';
import {
  MYSTERY_TALE,
  createMysteryTransport,
  extractionJson,
  fixedClock,
  makeChapter,
  makePlan,
  makeProjectState,
  sectionProse,
} from '../helpers/fixtures';

function binaryParser(res: request.Response, callback: (err: Error | null, body?: Buffer) => void) {
  const chunks: Buffer[] = [];
  res.on('data', (chunk) => {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  });
  res.on('end', () => callback(null, Buffer.concat(chunks)));
  res.on('error', (error) => callback(error));
}

function buildApp(healthCheck: () => string = () => 'connected') {
  const repository = new InMemoryProjectRepository();
  const transport = createMysteryTransport();
  const agents = new StoryAgents({
    transport,
    retryPolicy: new RetryPolicy({ maxAttempts: 1, baseDelayMs: 0 }),
  });
  const orchestrator = new PhaseOrchestrator({
    repository,
    agents,
    settings: {
      maxContextTokens: 8000,
      session: { minWords: 20, maxWords: 400 },
      critiqueInterval: 0,
      autoCommit: false,
    },
    clock: fixedClock,
  });
  const exportService = new ExportService({ repository, clock: fixedClock });
  const app = createApp({ orchestrator, exportService, clientOrigin: '*', healthCheck });
  return { app, repository, transport };
}

describe('HTTP API', () => {
  it('reports health from the persistence state', async () => {
    const healthy = await request(buildApp().app).get('/health');
    const unhealthy = await request(buildApp(() => 'disconnected').app).get('/health');

    expect(healthy.status).toBe(200);
    expect(healthy.body).toEqual({ code: 'SERVICE_HEALTHY', status: 'ok', mongo: 'connected' });
    expect(unhealthy.status).toBe(503);
    expect(unhealthy.body).toEqual({ code: 'SERVICE_UNHEALTHY', status: 'unhealthy', mongo: 'disconnected' });
  });

  it('echoes a caller supplied request id', async () => {
    const response = await request(buildApp().app).get('/health').set('X-Request-Id', 'req-42');

    expect(response.headers['x-request-id']).toBe('req-42');
  });

  it('rejects an invalid project with the failing fields', async () => {
    const response = await request(buildApp().app)
      .post('/api/projects')
      .send({ ...MYSTERY_TALE, storyType: 'poem' });

    expect(response.status).toBe(400);
    expect(response.body.code).toBe('VALIDATION_FAILED');
    expect(response.body.details.issues).toEqual([
      expect.objectContaining({ path: 'storyType', code: 'invalid_enum_value' }),
    ]);
  });

  it('answers malformed JSON with a 400', async () => {
    const response = await request(buildApp().app)
      .post('/api/projects')
      .set('Content-Type', 'application/json')
      .send('{"name": ');

    expect(response.status).toBe(400);
    expect(response.body.code).toBe('BAD_REQUEST');
  });

  it('returns 404 for unknown projects and routes', async () => {
    const { app } = buildApp();

    const project = await request(app).get('/api/projects/missing/status');
    const route = await request(app).get('/api/nowhere');

    expect(project.status).toBe(404);
    expect(project.body).toMatchObject({ code: 'PROJECT_NOT_FOUND', details: { project: 'missing' } });
    expect(route.status).toBe(404);
    expect(route.body.code).toBe('NOT_FOUND');
  });

  it('drives a project from creation to an exported first section', async () => {
    const { app } = buildApp();

    const created = await request(app).post('/api/projects').send(MYSTERY_TALE);
    expect(created.status).toBe(201);
    expect(created.body.project.phase).toBe('questioning');

    const answered = await request(app)
      .post('/api/projects/mystery-tale/answers')
      .send({ answers: { q1: 'Mara Quill, the harbour clerk.' } });
    expect(answered.status).toBe(200);
    expect(answered.body.project.phase).toBe('outlining');
    expect(answered.body.remainingQuestions).toEqual([]);

    const approvedOutline = await request(app).post('/api/projects/mystery-tale/outline/approve');
    expect(approvedOutline.body.project.phase).toBe('writing');

    const drafted = await request(app).post('/api/projects/mystery-tale/chapters/next');
    expect(drafted.status).toBe(200);
    expect(drafted.body.committed).toBe(false);
    expect(drafted.body.draft).toMatchObject({ index: 0, title: 'The Empty Drawer', wordCount: 51, blocked: false });

    const approved = await request(app).post('/api/projects/mystery-tale/chapters/approve').send({});
    expect(approved.status).toBe(201);
    expect(approved.body.chapter).toMatchObject({ index: 0, wordCount: 51, revisionCount: 0 });

    const summary = await request(app).get('/api/projects/mystery-tale/summary').query({ upto: 1 });
    expect(summary.body.summary.characters.map((character: { name: string }) => character.name)).toEqual([
      'Inspector Vale',
    ]);

    const exported = await request(app).get('/api/projects/mystery-tale/export').query({ format: 'txt' });
    expect(exported.status).toBe(200);
    expect(exported.headers['content-type']).toMatch(/^text\/plain/);
    expect(exported.headers['x-export-format']).toBe('text');
    expect(exported.headers['x-export-chapter-count']).toBe('1');
    expect(exported.text).toBe(
      `MYSTERY-TALE\n\n\nSection 1: The Empty Drawer\n${'='.repeat(27)}\n\n${sectionProse(1)}\n`
    );

    const log = await request(app).get('/api/projects/mystery-tale/log').query({ limit: 1 });
    expect(log.body.entries).toEqual([expect.objectContaining({ seq: 1, op: 'project.created' })]);
  });

  it('streams a markdown zip of the selected chapters', async () => {
    const { app, repository } = buildApp();
    await repository.create(
      makeProjectState({
        outline: [makePlan(0), makePlan(1)],
        chapters: [makeChapter(0, sectionProse(1)), makeChapter(1, sectionProse(2))],
      }),
      []
    );

    const response = await request(app)
      .get('/api/projects/harbour/export')
      .query({ format: 'zip', chapters: '2' })
      .buffer(true)
      .parse(binaryParser);

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('application/zip');
    expect(response.headers['x-export-range']).toBe('partial');

    const zip = await JSZip.loadAsync(response.body);
    const meta = zip.file('meta.json');
    expect(meta).not.toBeNull();
    expect(JSON.parse((await meta?.async('string')) ?? '{}')).toMatchObject({
      range: 'partial',
      chapters: [{ number: 2, file: 'chapters/002-Section 2.md' }],
    });
  });

  it('answers a blocked approval with 409 and the contradiction flags', async () => {
    const { app, repository, transport } = buildApp();
    await repository.create(
      makeProjectState({
        outline: [makePlan(0), makePlan(1)],
        chapters: [makeChapter(0, sectionProse(1))],
        worldFacts: [
          {
            id: 'fact-1',
            category: 'setting',
            subject: 'city electricity',
            statement: 'The city has no electricity.',
            establishedIn: 0,
            revisions: [],
          },
        ],
      }),
      []
    );
    transport.enqueue(
      'chapter',
      'Mara Quill waited in the dark archive of the old city. She switched on the lamp and read the ledger until the bells rang for the night watch.'
    );
    transport.enqueue('extraction', extractionJson({ characters: [], threads: [] }));

    await request(app).post('/api/projects/harbour/chapters/next').expect(200);
    const blocked = await request(app).post('/api/projects/harbour/chapters/approve').send({});

    expect(blocked.status).toBe(409);
    expect(blocked.body.code).toBe('CONTRADICTION');
    expect(blocked.body.details.chapterIndex).toBe(1);
    expect(blocked.body.details.flags).toEqual([expect.objectContaining({ ref: 'fact-1', entity: 'world-fact' })]);

    const overridden = await request(app).post('/api/projects/harbour/chapters/approve').send({ override: true });
    expect(overridden.status).toBe(201);
    expect(overridden.body.status.phase).toBe('complete');
  });

  it('takes author instructions with the next chapter and shows them on the draft', async () => {
    const { app, transport } = buildApp();
    await request(app).post('/api/projects').send(MYSTERY_TALE).expect(201);
    await request(app).post('/api/projects/mystery-tale/answers').send({ answers: { q1: 'Mara Quill.' } }).expect(200);
    await request(app).post('/api/projects/mystery-tale/outline/approve').expect(200);

    const drafted = await request(app)
      .post('/api/projects/mystery-tale/chapters/next')
      .send({ instructions: 'Open at the fish market.' });
    const tooLong = await request(app)
      .post('/api/projects/mystery-tale/chapters/next')
      .send({ instructions: 'x'.repeat(4001) });

    expect(drafted.status).toBe(200);
    expect(drafted.body.draft.instructions).toBe('Open at the fish market.');
    expect(transport.callsFor('chapter')[0].prompt).toContain('## Author instructions\nOpen at the fish market.');
    expect(tooLong.status).toBe(400);
    expect(tooLong.body.code).toBe('VALIDATION_FAILED');
  });

  it('refuses commands that do not fit the current phase', async () => {
    const { app } = buildApp();
    await request(app).post('/api/projects').send({ ...MYSTERY_TALE, analyse: false }).expect(201);

    const response = await request(app).post('/api/projects/mystery-tale/chapters/next');

    expect(response.status).toBe(409);
    expect(response.body).toMatchObject({
      code: 'INVALID_TRANSITION',
      details: { phase: 'analysis', expected: ['writing'] },
    });
  });
});
