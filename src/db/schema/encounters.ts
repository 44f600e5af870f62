import { sql } from 'drizzle-orm';
import {
  index,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from 'drizzle-orm/pg-core';
import { ENCOUNTER_STATUS } from '../types/index.js';
import type { EncounterStateV1 } from '../types/index.js';

export const encounters = pgTable(
  'encounters',
  {
    id: uuid('id').primaryKey(),
    userId: text('user_id').notNull(),
    questId: text('quest_id').notNull(),
    status: text('status', { enum: ENCOUNTER_STATUS }).notNull().default('ACTIVE'),
    state: jsonb('state').$type<EncounterStateV1>().notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => [
    index('encounters_user_status_idx').on(table.userId, table.status),
    // 플레이어당 ACTIVE 인카운터 1개
    uniqueIndex('encounters_user_active_idx')
      .on(table.userId)
      .where(sql`${table.status} = 'ACTIVE'`),
  ],
);
