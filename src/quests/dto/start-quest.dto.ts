import { z } from 'zod';

export const QuestIdParamSchema = z.string().min(1).max(64);
