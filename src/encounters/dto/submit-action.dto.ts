import { z } from 'zod';

/** 클라이언트가 본 라운드 — 다르면 ROUND_CONFLICT (중복 제출 방지) */
const expectedRound = z.number().int().min(1).optional();

export const SubmitActionBodySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ATTACK'), expectedRound }),
  z.object({ type: z.literal('DEFEND'), expectedRound }),
  z.object({ type: z.literal('SPECIAL'), abilityId: z.string().min(1).max(64), expectedRound }),
]);

export type SubmitActionBody = z.infer<typeof SubmitActionBodySchema>;

export const EncounterIdParamSchema = z.string().uuid();
