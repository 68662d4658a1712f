import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Raw environment variables recognized by the service.
 *
 * Everything is optional except JWT_SECRET; defaults are applied when
 * the validated values are turned into ScribeConfig.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsString()
  @IsNotEmpty({ message: 'JWT_SECRET must be set to a non-empty value' })
  JWT_SECRET!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  ACCESS_TOKEN_TTL_MINUTES?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  REFRESH_TOKEN_TTL_DAYS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  MAX_UPLOAD_BYTES?: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  ALLOWED_AUDIO_FORMATS?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  SCRATCH_DIR?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  TRANSCRIPTION_TIMEOUT_MS?: number;

  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  TRANSCRIPTION_MODEL?: string;

  @IsOptional()
  @IsString()
  POSTGRES_HOST?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  POSTGRES_PORT?: number;

  @IsOptional()
  @IsString()
  POSTGRES_USER?: string;

  @IsOptional()
  @IsString()
  POSTGRES_PASSWORD?: string;

  @IsOptional()
  @IsString()
  POSTGRES_DB?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  DB_POOL_MAX?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  CORS_ORIGIN?: string;
}

/**
 * Validate and coerce a raw environment record.
 *
 * @throws Error listing every constraint that failed
 */
export function validateEnvironment(
  env: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, env, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
