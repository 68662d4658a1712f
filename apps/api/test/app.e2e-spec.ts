import { INestApplication } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { Test } from '@nestjs/testing';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { request as httpRequest } from 'http';
import type { Server } from 'http';
import { tmpdir } from 'os';
import { join } from 'path';
import request from 'supertest';
import { applyGlobalConfiguration } from '../src/app.setup';
import { loadScribeConfig, scribeConfig } from '../src/config/scribe.config';
import { CLOCK, systemClock } from '../src/common/clock';
import { jwtModuleOptions } from '../src/auth/auth.module';
import { AuthController } from '../src/auth/auth.controller';
import { ProfileController } from '../src/auth/profile.controller';
import { AuthService } from '../src/auth/auth.service';
import { TokenService } from '../src/auth/token.service';
import { PasswordHasher } from '../src/auth/password-hasher.service';
import { JwtAuthGuard } from '../src/auth/guards';
import { CredentialStore } from '../src/auth/credentials/credential-store';
import { TranscriptsController } from '../src/transcripts/transcripts.controller';
import { TranscriptsService } from '../src/transcripts/transcripts.service';
import { TranscriptionPipeline } from '../src/transcripts/transcription-pipeline.service';
import { UploadStager } from '../src/transcripts/upload/upload-stager.service';
import { TranscriptionEngine } from '../src/transcripts/engine/transcription-engine';
import { TranscriptRepository } from '../src/transcripts/repository/transcript.repository';
import { InMemoryCredentialStore } from './support/in-memory-credential-store';
import { InMemoryTranscriptRepository } from './support/in-memory-transcript-repository';
import { StubTranscriptionEngine } from './support/stub-transcription-engine';

const PASSWORD = 'pw123456';

async function waitFor(condition: () => Promise<boolean>, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await condition())) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

describe('Scribe API (e2e)', () => {
  let app: INestApplication;
  let scratchDir: string;
  let engine: StubTranscriptionEngine;
  let credentials: InMemoryCredentialStore;

  async function startApp(env: Record<string, string> = {}): Promise<void> {
    const config = loadScribeConfig({ JWT_SECRET: 'test-secret', SCRATCH_DIR: scratchDir, ...env });
    engine = new StubTranscriptionEngine();
    credentials = new InMemoryCredentialStore();

    const moduleRef = await Test.createTestingModule({
      imports: [JwtModule.register(jwtModuleOptions(config))],
      controllers: [AuthController, ProfileController, TranscriptsController],
      providers: [
        AuthService,
        TokenService,
        PasswordHasher,
        JwtAuthGuard,
        TranscriptsService,
        TranscriptionPipeline,
        UploadStager,
        { provide: scribeConfig.KEY, useValue: config },
        { provide: CLOCK, useValue: systemClock },
        { provide: CredentialStore, useValue: credentials },
        { provide: TranscriptRepository, useValue: new InMemoryTranscriptRepository() },
        { provide: TranscriptionEngine, useValue: engine },
      ],
    }).compile();

    app = moduleRef.createNestApplication({ logger: false });
    applyGlobalConfiguration(app);
    await app.init();
  }

  beforeEach(async () => {
    scratchDir = await mkdtemp(join(tmpdir(), 'scribe-e2e-'));
    await startApp();
  });

  afterEach(async () => {
    await app.close();
    await rm(scratchDir, { recursive: true, force: true });
  });

  async function registerAndLogin(
    email: string,
  ): Promise<{ accessToken: string; refreshToken: string; userId: string }> {
    await request(app.getHttpServer())
      .post('/auth/register')
      .send({ email, password: PASSWORD })
      .expect(201);

    const login = await request(app.getHttpServer())
      .post('/auth/login')
      .send({ email, password: PASSWORD })
      .expect(200);

    return {
      accessToken: login.body.access_token,
      refreshToken: login.body.refresh_token,
      userId: login.body.user.id,
    };
  }

  function uploadClip(accessToken: string, fileName = 'clip.wav'): request.Test {
    return request(app.getHttpServer())
      .post('/transcripts')
      .set('Authorization', `Bearer ${accessToken}`)
      .attach('audio', Buffer.from('0123456789'), fileName);
  }

  describe('auth', () => {
    it('registers a user and returns the summary', async () => {
      const response = await request(app.getHttpServer())
        .post('/auth/register')
        .send({ email: 'User@Example.com', password: PASSWORD })
        .expect(201);

      expect(response.body.email).toBe('user@example.com');
      expect(response.body.passwordHash).toBeUndefined();
    });

    it('refuses a duplicate email with 409', async () => {
      await registerAndLogin('user@example.com');

      const response = await request(app.getHttpServer())
        .post('/auth/register')
        .send({ email: 'user@example.com', password: PASSWORD })
        .expect(409);

      expect(response.body.code).toBe('EMAIL_TAKEN');
    });

    it('rejects an invalid registration body with 400', async () => {
      const response = await request(app.getHttpServer())
        .post('/auth/register')
        .send({ email: 'not-an-email', password: 'short' })
        .expect(400);

      expect(response.body.code).toBe('VALIDATION_FAILED');
    });

    it('rejects a wrong password with 401', async () => {
      await registerAndLogin('user@example.com');

      const response = await request(app.getHttpServer())
        .post('/auth/login')
        .send({ email: 'user@example.com', password: 'pw654321' })
        .expect(401);

      expect(response.body.code).toBe('INVALID_CREDENTIALS');
    });

    it('returns the profile behind a valid access token', async () => {
      const { accessToken, userId } = await registerAndLogin('user@example.com');

      const response = await request(app.getHttpServer())
        .get('/me')
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(200);

      expect(response.body.id).toBe(userId);
      expect(response.body.email).toBe('user@example.com');
    });

    it('refreshes the pair and the new access token works', async () => {
      const { refreshToken, userId } = await registerAndLogin('user@example.com');

      const refreshed = await request(app.getHttpServer())
        .post('/auth/refresh')
        .send({ refresh_token: refreshToken })
        .expect(200);

      const profile = await request(app.getHttpServer())
        .get('/me')
        .set('Authorization', `Bearer ${refreshed.body.access_token}`)
        .expect(200);
      expect(profile.body.id).toBe(userId);
    });

    it('refuses an access token on the refresh route', async () => {
      const { accessToken } = await registerAndLogin('user@example.com');

      const response = await request(app.getHttpServer())
        .post('/auth/refresh')
        .send({ refresh_token: accessToken })
        .expect(401);

      expect(response.body.code).toBe('TOKEN_WRONG_KIND');
    });

    it('refuses a refresh token as a bearer credential', async () => {
      const { refreshToken } = await registerAndLogin('user@example.com');

      const response = await request(app.getHttpServer())
        .get('/me')
        .set('Authorization', `Bearer ${refreshToken}`)
        .expect(401);

      expect(response.body.code).toBe('UNAUTHORIZED');
    });

    it('answers 401 USER_NOT_FOUND once the user behind a token is gone', async () => {
      const { accessToken, userId } = await registerAndLogin('user@example.com');
      credentials.remove(userId);

      const response = await request(app.getHttpServer())
        .get('/me')
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(401);

      expect(response.body).toEqual({
        statusCode: 401,
        error: 'Unauthorized',
        code: 'USER_NOT_FOUND',
        message: 'User no longer exists',
      });
    });
  });

  describe('transcripts', () => {
    it('transcribes an upload and lists it for its owner', async () => {
      const { accessToken } = await registerAndLogin('user@example.com');
      engine.respondWith('hello world');

      const created = await uploadClip(accessToken).expect(201);

      expect(created.body.text).toBe('hello world');
      expect(created.body.filename).toBe('clip.wav');
      expect(created.body.fileSizeBytes).toBe(10);
      await expect(readdir(scratchDir)).resolves.toEqual([]);

      const listed = await request(app.getHttpServer())
        .get('/transcripts')
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(200);

      expect(listed.body.data).toHaveLength(1);
      expect(listed.body.data[0].id).toBe(created.body.id);
      expect(listed.body.data[0].text).toBe('hello world');
      expect(listed.body.total).toBe(1);
      expect(listed.body.page).toBe(1);
      expect(listed.body.limit).toBe(10);
      expect(listed.body.totalPages).toBe(1);
    });

    it("answers 404 for another user's transcript", async () => {
      const owner = await registerAndLogin('user@example.com');
      const created = await uploadClip(owner.accessToken).expect(201);
      const stranger = await registerAndLogin('other@example.com');

      const response = await request(app.getHttpServer())
        .get(`/transcripts/${created.body.id}`)
        .set('Authorization', `Bearer ${stranger.accessToken}`)
        .expect(404);

      expect(response.body.code).toBe('TRANSCRIPT_NOT_FOUND');
    });

    it('fetches and deletes an own transcript', async () => {
      const { accessToken } = await registerAndLogin('user@example.com');
      const created = await uploadClip(accessToken).expect(201);

      const fetched = await request(app.getHttpServer())
        .get(`/transcripts/${created.body.id}`)
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(200);
      expect(fetched.body.text).toBe('hello world');

      await request(app.getHttpServer())
        .delete(`/transcripts/${created.body.id}`)
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(204);

      await request(app.getHttpServer())
        .get(`/transcripts/${created.body.id}`)
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(404);
    });

    it('requires a bearer token', async () => {
      const response = await request(app.getHttpServer()).get('/transcripts').expect(401);

      expect(response.body.code).toBe('UNAUTHORIZED');
    });

    it('rejects an unsupported format with 422 and never calls the engine', async () => {
      const { accessToken } = await registerAndLogin('user@example.com');

      const response = await uploadClip(accessToken, 'notes.txt').expect(422);

      expect(response.body.code).toBe('UNSUPPORTED_FORMAT');
      expect(engine.callCount).toBe(0);
    });

    it('answers 400 when the audio field is missing', async () => {
      const { accessToken } = await registerAndLogin('user@example.com');

      const response = await request(app.getHttpServer())
        .post('/transcripts')
        .set('Authorization', `Bearer ${accessToken}`)
        .field('title', 'no file here')
        .expect(400);

      expect(response.body.code).toBe('MISSING_FILE');
    });

    it('answers 400 for a body that is not multipart', async () => {
      const { accessToken } = await registerAndLogin('user@example.com');

      const response = await request(app.getHttpServer())
        .post('/transcripts')
        .set('Authorization', `Bearer ${accessToken}`)
        .send({ audio: 'not a file' })
        .expect(400);

      expect(response.body.code).toBe('MALFORMED_MULTIPART');
    });

    it('maps an engine failure to 500 with a stable code', async () => {
      const { accessToken } = await registerAndLogin('user@example.com');
      engine.failWith(new Error('model crashed'));

      const response = await uploadClip(accessToken).expect(500);

      expect(response.body.code).toBe('TRANSCRIPTION_FAILED');
      expect(response.body.message).toBe('Transcription failed. Please try again.');
      await expect(readdir(scratchDir)).resolves.toEqual([]);
    });

    it('rejects an out-of-range page size', async () => {
      const { accessToken } = await registerAndLogin('user@example.com');

      const response = await request(app.getHttpServer())
        .get('/transcripts?limit=101')
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(400);

      expect(response.body.code).toBe('VALIDATION_FAILED');
    });

    it('answers 413 when the declared size is over the limit, before reading the file', async () => {
      await app.close();
      await startApp({ MAX_UPLOAD_BYTES: '64' });
      const { accessToken } = await registerAndLogin('user@example.com');

      const response = await uploadClip(accessToken).expect(413);

      expect(response.body.code).toBe('UPLOAD_TOO_LARGE');
      expect(engine.callCount).toBe(0);
      await expect(readdir(scratchDir)).resolves.toEqual([]);
    });

    it('removes the partial file when the client disconnects mid-upload', async () => {
      const { accessToken } = await registerAndLogin('user@example.com');
      await app.listen(0, '127.0.0.1');
      const server: Server = app.getHttpServer();
      const address = server.address();
      if (address === null || typeof address === 'string') {
        throw new Error('Expected the server to listen on a TCP port');
      }

      const boundary = 'scribe-e2e-boundary';
      const upload = httpRequest({
        host: '127.0.0.1',
        port: address.port,
        method: 'POST',
        path: '/transcripts',
        headers: {
          Authorization: `Bearer ${accessToken}`,
          'Content-Type': `multipart/form-data; boundary=${boundary}`,
          'Content-Length': String(1_000_000),
        },
      });
      const aborted = new Promise<void>((resolve) => upload.once('close', () => resolve()));
      upload.on('error', () => undefined);

      upload.write(
        `--${boundary}\r\n` +
          'Content-Disposition: form-data; name="audio"; filename="clip.wav"\r\n' +
          'Content-Type: audio/wav\r\n\r\n',
      );
      upload.write(Buffer.alloc(5000, 1));

      await waitFor(async () => (await readdir(scratchDir)).length === 1);
      upload.destroy();
      await aborted;

      await waitFor(async () => (await readdir(scratchDir)).length === 0);
      expect(engine.callCount).toBe(0);
    });
  });
});
