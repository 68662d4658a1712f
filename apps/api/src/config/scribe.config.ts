import { registerAs } from '@nestjs/config';
import { tmpdir } from 'os';
import { join } from 'path';
import { validateEnvironment } from './environment.validation';

const BYTES_PER_MB = 1024 * 1024;

export const DEFAULT_ALLOWED_AUDIO_FORMATS = [
  'wav',
  'mp3',
  'm4a',
  'flac',
  'ogg',
] as const;

/**
 * Immutable settings consumed by the auth and transcription components.
 * Built once at boot and injected; request handlers never read process.env.
 */
export type ScribeConfig = {
  readonly auth: {
    readonly jwtSecret: string;
    readonly accessTokenTtlMinutes: number;
    readonly refreshTokenTtlDays: number;
  };
  readonly uploads: {
    readonly maxBytes: number;
    readonly allowedFormats: readonly string[];
    readonly scratchDir: string;
  };
  readonly transcription: {
    readonly timeoutMs: number;
    readonly openaiApiKey: string | null;
    readonly model: string;
  };
  readonly database: {
    readonly host: string;
    readonly port: number;
    readonly username: string;
    readonly password: string;
    readonly name: string;
    readonly poolMax: number;
    readonly logging: boolean;
  };
  readonly http: {
    readonly port: number;
    readonly corsOrigin: string;
  };
};

/**
 * Parse a comma-separated format list ("WAV, .mp3") into normalized
 * extensions without dots ("wav", "mp3").
 */
export function parseAudioFormats(raw: string): string[] {
  const formats = raw
    .split(',')
    .map((format) => format.trim().toLowerCase().replace(/^\./, ''))
    .filter((format) => format.length > 0);

  return [...new Set(formats)];
}

/**
 * Build a ScribeConfig from an environment record, applying defaults.
 *
 * @throws Error if validation fails
 */
export function loadScribeConfig(env: Record<string, unknown>): ScribeConfig {
  const vars = validateEnvironment(env);

  const allowedFormats = vars.ALLOWED_AUDIO_FORMATS
    ? parseAudioFormats(vars.ALLOWED_AUDIO_FORMATS)
    : [...DEFAULT_ALLOWED_AUDIO_FORMATS];

  if (allowedFormats.length === 0) {
    throw new Error(
      'Invalid environment configuration: ALLOWED_AUDIO_FORMATS lists no formats',
    );
  }

  return deepFreeze({
    auth: {
      jwtSecret: vars.JWT_SECRET,
      accessTokenTtlMinutes: vars.ACCESS_TOKEN_TTL_MINUTES ?? 15,
      refreshTokenTtlDays: vars.REFRESH_TOKEN_TTL_DAYS ?? 7,
    },
    uploads: {
      maxBytes: vars.MAX_UPLOAD_BYTES ?? 50 * BYTES_PER_MB,
      allowedFormats,
      scratchDir: vars.SCRATCH_DIR ?? join(tmpdir(), 'scribe-uploads'),
    },
    transcription: {
      timeoutMs: vars.TRANSCRIPTION_TIMEOUT_MS ?? 300_000,
      openaiApiKey: vars.OPENAI_API_KEY || null,
      model: vars.TRANSCRIPTION_MODEL ?? 'whisper-1',
    },
    database: {
      host: vars.POSTGRES_HOST ?? 'localhost',
      port: vars.POSTGRES_PORT ?? 5432,
      username: vars.POSTGRES_USER ?? 'scribe',
      password: vars.POSTGRES_PASSWORD ?? 'scribe_secret',
      name: vars.POSTGRES_DB ?? 'scribe',
      poolMax: vars.DB_POOL_MAX ?? 10,
      logging: vars.NODE_ENV !== 'production',
    },
    http: {
      port: vars.PORT ?? 4000,
      corsOrigin: vars.CORS_ORIGIN ?? 'http://localhost:3000',
    },
  });
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (typeof nested === 'object' && nested !== null) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Config namespace registered with ConfigModule.
 *
 * Inject with `@Inject(scribeConfig.KEY) config: ScribeConfig`.
 */
export const scribeConfig = registerAs('scribe', () =>
  loadScribeConfig(process.env),
);
