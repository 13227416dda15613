import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '@day-profile/shared/Types/errors';
import {
  CrowdCodeSchema,
  DayLevelSchema,
  MoonPhaseCodeSchema,
  TrainingIntensitySchema,
  type CrowdCode,
  type DayLevel,
  type MoonPhaseCode,
  type TrainingIntensity,
} from '../profile/schema.js';

const bias = z.number().int().min(-2).max(2);
const text = z.string().min(1);
const labelled = z.object({ label: text, description: text });

const trainingEntry = z.object({ focus: text, summary: text, exercises: z.array(text) });

const levelRecord = <T extends z.ZodTypeAny>(value: T) =>
  z.object({ high: value, medium: value, low: value });

const crowdRecord = <T extends z.ZodTypeAny>(value: T) =>
  z.object({ euphoria: value, greed: value, calm: value, anxiety: value, panic: value });

export const InterpretationTablesSchema = z
  .object({
    tzolkinSigns: z.record(
      z.object({ polarity: bias, crowd: bias, keyword: text })
    ),
    numberEnergy: z.array(bias).length(13),
    moonPhases: z.record(
      MoonPhaseCodeSchema,
      z.object({ name: text, classBias: bias, crowdBias: bias })
    ),
    levels: levelRecord(labelled.extend({ tradingSignal: labelled })),
    crowdStates: crowdRecord(labelled.extend({ scenario: text })),
    botModes: z.record(labelled),
    botModeMatrix: levelRecord(crowdRecord(text)),
    fallbackBotMode: text,
    training: z.object({
      recovery: trainingEntry,
      light: trainingEntry,
      moderate: trainingEntry,
      high: trainingEntry,
    }),
    schedule: z.object({
      wakeActive: text,
      wakeSoft: text,
      focusWork: text,
      routineWork: text,
      tradingByLevel: levelRecord(text),
      training: text,
      walk: text,
      eveningQuiet: text,
      eveningSocial: text,
      sleepEarly: text,
      sleep: text,
    }),
    nutrition: z.object({
      summaryByLevel: levelRecord(text),
      base: z.array(text),
      byPhase: z.record(MoonPhaseCodeSchema, text),
    }),
  })
  .superRefine((tables, ctx) => {
    const modes = Object.keys(tables.botModes);
    if (!modes.includes(tables.fallbackBotMode)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown fallback bot mode ${tables.fallbackBotMode}` });
    }
    for (const level of DayLevelSchema.options) {
      for (const crowd of CrowdCodeSchema.options) {
        const mode = tables.botModeMatrix[level][crowd];
        if (!modes.includes(mode)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['botModeMatrix', level, crowd],
            message: `Unknown bot mode ${mode}`,
          });
        }
      }
    }
    for (const phase of MoonPhaseCodeSchema.options) {
      if (!tables.moonPhases[phase]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['moonPhases', phase], message: 'Missing moon phase' });
      }
    }
  });

export type InterpretationTables = z.infer<typeof InterpretationTablesSchema>;

export const DEFAULT_TABLES_URL = new URL('../../data/interpretation.json', import.meta.url);

/**
 * Read and validate the interpretation rule tables.
 */
export function loadInterpretationTables(source: URL | string = DEFAULT_TABLES_URL): InterpretationTables {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(source, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read interpretation tables from ${String(source)}`, { error });
  }

  const result = InterpretationTablesSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid interpretation tables', result.error.flatten());
  }
  return result.data;
}

// ── Scoring rules ────────────────────────────────────────────────

export function levelFromScore(score: number): DayLevel {
  if (score >= 2) return 'high';
  if (score <= -1) return 'low';
  return 'medium';
}

export function crowdFromScore(score: number): CrowdCode {
  if (score >= 3) return 'euphoria';
  if (score >= 1) return 'greed';
  if (score === 0) return 'calm';
  if (score >= -2) return 'anxiety';
  return 'panic';
}

/** Late numbers of the 13-day trecena heat the crowd, early ones cool it. */
export function trecenaCrowdBias(tzolkinNumber: number): number {
  if (tzolkinNumber >= 10) return 1;
  if (tzolkinNumber <= 3) return -1;
  return 0;
}

const INTENSITY_ORDER: readonly TrainingIntensity[] = TrainingIntensitySchema.options;

export function trainingIntensity(physical: number, level: DayLevel, phaseCode: MoonPhaseCode): TrainingIntensity {
  let index: number;
  if (physical >= 50) index = 3;
  else if (physical >= 0) index = 2;
  else if (physical >= -50) index = 1;
  else index = 0;

  if (level === 'low') index = Math.max(0, index - 1);
  if (phaseCode === 'new' || phaseCode === 'full') index = Math.min(index, 1);

  return INTENSITY_ORDER[index];
}

export function calorieAdjustment(physical: number, phaseCode: MoonPhaseCode): number {
  let adjustment = 0;
  if (physical >= 50) adjustment += 10;
  else if (physical < -50) adjustment -= 10;
  if (phaseCode === 'new') adjustment -= 10;
  return adjustment;
}
