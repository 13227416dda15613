import { z } from 'zod';
import type { DeepReadonly } from './deep-freeze.js';

export const MOON_PHASE_CODES = [
  'new',
  'waxing_crescent',
  'first_quarter',
  'waxing_gibbous',
  'full',
  'waning_gibbous',
  'last_quarter',
  'waning_crescent',
] as const;

export const MoonPhaseCodeSchema = z.enum(MOON_PHASE_CODES);
export type MoonPhaseCode = z.infer<typeof MoonPhaseCodeSchema>;

export const DayLevelSchema = z.enum(['high', 'medium', 'low']);
export type DayLevel = z.infer<typeof DayLevelSchema>;

export const CrowdCodeSchema = z.enum(['euphoria', 'greed', 'calm', 'anxiety', 'panic']);
export type CrowdCode = z.infer<typeof CrowdCodeSchema>;

export const TrainingIntensitySchema = z.enum(['recovery', 'light', 'moderate', 'high']);
export type TrainingIntensity = z.infer<typeof TrainingIntensitySchema>;

export const SECONDARY_PROFILE_KINDS = ['sumerian', 'eastern'] as const;
export const SecondaryProfileKindSchema = z.enum(SECONDARY_PROFILE_KINDS);
export type SecondaryProfileKind = z.infer<typeof SecondaryProfileKindSchema>;

const scalar = z.number().finite();
const text = z.string().min(1);

export const CalendarPositionSchema = z.object({
  tzolkinNumber: scalar,
  tzolkinName: text,
  haabDay: scalar,
  haabMonth: text,
});
export type CalendarPosition = z.infer<typeof CalendarPositionSchema>;

export const MoonPhaseSchema = z.object({
  phaseCode: MoonPhaseCodeSchema,
  phaseName: text,
  age: scalar,
  illumination: scalar,
});
export type MoonPhase = z.infer<typeof MoonPhaseSchema>;

export const DayClassificationSchema = z.object({
  level: DayLevelSchema,
  label: text,
  description: text,
  tradingSignalLabel: text,
  tradingSignalDescription: text,
});
export type DayClassification = z.infer<typeof DayClassificationSchema>;

export const CrowdStateSchema = z.object({
  code: CrowdCodeSchema,
  label: text,
  description: text,
  scenario: text,
});
export type CrowdState = z.infer<typeof CrowdStateSchema>;

export const BotModeSchema = z.object({
  code: text,
  label: text,
  description: text,
});
export type BotMode = z.infer<typeof BotModeSchema>;

export const BiorhythmsSchema = z.object({
  physical: scalar,
  emotional: scalar,
  intellectual: scalar,
  spiritual: scalar,
});
export type Biorhythms = z.infer<typeof BiorhythmsSchema>;

export const TrainingPlanSchema = z.object({
  intensity: TrainingIntensitySchema,
  focus: text,
  summary: text,
  exercises: z.array(text),
});
export type TrainingPlan = z.infer<typeof TrainingPlanSchema>;

export const DailyScheduleSchema = z.object({
  personalDay: scalar,
  blocks: z
    .array(
      z.object({
        time: z.string().regex(/^\d{2}:\d{2}$/),
        activity: text,
      })
    )
    .min(1),
});
export type DailySchedule = z.infer<typeof DailyScheduleSchema>;

export const NutritionProfileSchema = z.object({
  summary: text,
  calorieAdjustment: scalar,
  recommendations: z.array(text),
});
export type NutritionProfile = z.infer<typeof NutritionProfileSchema>;

export const SecondaryProfileSchema = z.object({
  system: text,
  label: text,
  description: text,
});
export type SecondaryProfile = z.infer<typeof SecondaryProfileSchema>;

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const CrowdSliceSchema = z.object({
  date: isoDate,
  calendrical: CalendarPositionSchema,
  lunar: MoonPhaseSchema,
  crowdState: CrowdStateSchema,
});

export const ModeSliceSchema = CrowdSliceSchema.extend({
  classification: DayClassificationSchema,
  botMode: BotModeSchema,
});

export const DayProfileSchema = ModeSliceSchema.extend({
  biorhythm: BiorhythmsSchema,
  training: TrainingPlanSchema,
  schedule: DailyScheduleSchema,
  nutrition: NutritionProfileSchema,
  secondary: z.object({
    sumerian: SecondaryProfileSchema.optional(),
    eastern: SecondaryProfileSchema.optional(),
  }),
});

export type CrowdSlice = DeepReadonly<z.infer<typeof CrowdSliceSchema>>;
export type ModeSlice = DeepReadonly<z.infer<typeof ModeSliceSchema>>;
export type DayProfile = DeepReadonly<z.infer<typeof DayProfileSchema>>;
