import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseModule } from '@scribe/database';
import { scribeConfig } from './config/scribe.config';
import type { ScribeConfig } from './config/scribe.config';
import { HealthModule } from './health/health.module';
import { AuthModule } from './auth/auth.module';
import { TranscriptsModule } from './transcripts/transcripts.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      load: [scribeConfig],
    }),

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [scribeConfig.KEY],
      useFactory: (config: ScribeConfig) => ({
        type: 'postgres' as const,
        host: config.database.host,
        port: config.database.port,
        username: config.database.username,
        password: config.database.password,
        database: config.database.name,
        autoLoadEntities: true,
        synchronize: false,
        logging: config.database.logging,
        extra: { max: config.database.poolMax },
      }),
    }),

    // ── Shared Database Repositories ─────────────────────
    DatabaseModule.forFeature(),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    AuthModule,
    TranscriptsModule,
  ],
})
export class AppModule {}
