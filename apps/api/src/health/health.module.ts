import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { ScratchDirHealthIndicator } from './scratch-dir.health';

@Module({
  imports: [TerminusModule],
  controllers: [HealthController],
  providers: [ScratchDirHealthIndicator],
})
export class HealthModule {}
