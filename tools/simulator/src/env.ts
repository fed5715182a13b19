import { z } from 'zod';
import { Config } from '@science-trivia/shared-types';

export const SimulatorEnvSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default(Config.simulator.logLevel),
  AXIOM_TOKEN: z.string().optional(),
  AXIOM_ORG_ID: z.string().optional(),
  AXIOM_DATASET: z.string().min(1).default(Config.simulator.axiomDataset),
});

export type SimulatorEnv = z.infer<typeof SimulatorEnvSchema>;
