// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';
export { Transcript } from './entities/transcript.entity';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
