import { Inject, Injectable } from '@nestjs/common';
import { and, eq, sql } from 'drizzle-orm';
import { EncounterConflictError } from '../common/errors/game-errors.js';
import { DB, type DrizzleDB } from './drizzle.module.js';
import { encounters, playerProgress } from './schema/index.js';
import type { GameStore, GameStoreCommit } from './game-store.js';
import type { EncounterRecord } from './types/index.js';

type EncounterRow = typeof encounters.$inferSelect;

function toRecord(row: EncounterRow): EncounterRecord {
  return {
    encounterId: row.id,
    userId: row.userId,
    questId: row.questId,
    status: row.status,
    state: row.state,
  };
}

@Injectable()
export class DrizzleGameStore implements GameStore {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async loadProgress(userId: string): Promise<unknown> {
    const row = await this.db.query.playerProgress.findFirst({
      where: eq(playerProgress.userId, userId),
    });
    return row?.progress ?? null;
  }

  async getEncounter(encounterId: string): Promise<EncounterRecord | null> {
    const row = await this.db.query.encounters.findFirst({
      where: eq(encounters.id, encounterId),
    });
    return row ? toRecord(row) : null;
  }

  async getActiveEncounter(userId: string): Promise<EncounterRecord | null> {
    const row = await this.db.query.encounters.findFirst({
      where: and(eq(encounters.userId, userId), eq(encounters.status, 'ACTIVE')),
    });
    return row ? toRecord(row) : null;
  }

  async commit(userId: string, changes: GameStoreCommit): Promise<void> {
    const now = new Date();
    await this.db.transaction(async (tx) => {
      const enc = changes.encounter;
      if (enc && changes.expectedRound !== undefined) {
        // 조건부 갱신: 동시 제출 중 하나만 통과, 나머지는 롤백
        const updated = await tx
          .update(encounters)
          .set({ status: enc.status, state: enc.state, updatedAt: now })
          .where(
            and(
              eq(encounters.id, enc.encounterId),
              eq(encounters.status, 'ACTIVE'),
              sql`(${encounters.state}->>'round')::int = ${changes.expectedRound}`,
            ),
          )
          .returning({ id: encounters.id });
        if (updated.length === 0) {
          throw new EncounterConflictError('ROUND_CONFLICT', 'Encounter was updated concurrently', {
            encounterId: enc.encounterId,
            expectedRound: changes.expectedRound,
          });
        }
      } else if (enc) {
        await tx.insert(encounters).values({
          id: enc.encounterId,
          userId: enc.userId,
          questId: enc.questId,
          status: enc.status,
          state: enc.state,
        });
      }

      if (changes.progress) {
        await tx
          .insert(playerProgress)
          .values({ userId, progress: changes.progress })
          .onConflictDoUpdate({
            target: playerProgress.userId,
            set: { progress: changes.progress, updatedAt: now },
          });
      }
    });
  }
}
