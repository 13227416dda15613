import type { z } from 'zod';
import type { CalendricalEngine } from '../engine/types.js';
import { AggregationError } from '../utils/errors.js';
import { addDays, toIsoDate, type CalendarDate } from './calendar-date.js';
import { deepFreeze, type DeepReadonly } from './deep-freeze.js';
import {
  CrowdSliceSchema,
  DayProfileSchema,
  ModeSliceSchema,
  type CalendarPosition,
  type CrowdSlice,
  type DayProfile,
  type ModeSlice,
  type MoonPhase,
  type SecondaryProfile,
  type SecondaryProfileKind,
} from './schema.js';

export const WEEK_LENGTH = 7;

export interface AggregatorOptions {
  birthDate: CalendarDate;
  /** Secondary calendar systems to include; empty means none. */
  secondaryProfiles?: readonly SecondaryProfileKind[];
}

/**
 * Run `compute`, check the result against `schema` and freeze it. Any thrown
 * error or schema violation becomes one AggregationError for the date, so a
 * caller never sees a partial result.
 */
function computeAtomically<S extends z.ZodTypeAny>(
  date: CalendarDate,
  schema: S,
  compute: () => unknown
): DeepReadonly<z.infer<S>> {
  const iso = toIsoDate(date);
  let raw: unknown;
  try {
    raw = compute();
  } catch (error) {
    throw new AggregationError(iso, error);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new AggregationError(iso, result.error);
  }
  const data: z.infer<S> = result.data;
  return deepFreeze(data);
}

/**
 * Builds day profiles from the calendrical engine. Stateless: every call
 * recomputes from scratch and nothing is cached between calls.
 */
export class ProfileAggregator {
  private readonly secondaryProfiles: readonly SecondaryProfileKind[];

  constructor(
    private readonly engine: CalendricalEngine,
    private readonly options: AggregatorOptions
  ) {
    this.secondaryProfiles = options.secondaryProfiles ?? [];
  }

  aggregate(date: CalendarDate): DayProfile {
    return computeAtomically(date, DayProfileSchema, () => {
      const { engine } = this;
      const { birthDate } = this.options;

      const mode = this.computeModeSlice(date);
      const { classification } = mode;
      const { phaseCode } = mode.lunar;

      const biorhythm = engine.biorhythms(birthDate, date);

      return {
        ...mode,
        biorhythm,
        training: engine.trainingRecommendation(biorhythm, classification, phaseCode),
        schedule: engine.dailySchedule(birthDate, date, classification, phaseCode, biorhythm),
        nutrition: engine.nutritionProfile(biorhythm, classification, phaseCode),
        secondary: this.computeSecondary(date),
      };
    });
  }

  /** Seven consecutive profiles starting at `start`. */
  aggregateWeek(start: CalendarDate): DayProfile[] {
    return Array.from({ length: WEEK_LENGTH }, (_, offset) => this.aggregate(addDays(start, offset)));
  }

  /** Only what the crowd view needs: position, moon and crowd state. */
  aggregateCrowd(date: CalendarDate): CrowdSlice {
    return computeAtomically(date, CrowdSliceSchema, () => this.computeCrowdSlice(date));
  }

  /** Crowd slice plus classification and the bot mode derived from both. */
  aggregateMode(date: CalendarDate): ModeSlice {
    return computeAtomically(date, ModeSliceSchema, () => this.computeModeSlice(date));
  }

  private computeBase(date: CalendarDate): { calendrical: CalendarPosition; lunar: MoonPhase } {
    return {
      calendrical: this.engine.calendarPosition(date),
      lunar: this.engine.moonPhase(date),
    };
  }

  private computeCrowdSlice(date: CalendarDate) {
    const { calendrical, lunar } = this.computeBase(date);
    return {
      date: toIsoDate(date),
      calendrical,
      lunar,
      crowdState: this.engine.crowdState(calendrical.tzolkinNumber, calendrical.tzolkinName, lunar.phaseCode),
    };
  }

  private computeModeSlice(date: CalendarDate) {
    const crowd = this.computeCrowdSlice(date);
    const { tzolkinNumber, tzolkinName } = crowd.calendrical;
    const classification = this.engine.classifyDay(tzolkinNumber, tzolkinName, crowd.lunar.phaseCode);

    return {
      ...crowd,
      classification,
      botMode: this.engine.botMode(classification.tradingSignalLabel, crowd.crowdState.code),
    };
  }

  private computeSecondary(date: CalendarDate): { sumerian?: SecondaryProfile; eastern?: SecondaryProfile } {
    const secondary: { sumerian?: SecondaryProfile; eastern?: SecondaryProfile } = {};
    if (this.secondaryProfiles.includes('sumerian')) {
      secondary.sumerian = this.engine.sumerianProfile(date);
    }
    if (this.secondaryProfiles.includes('eastern')) {
      secondary.eastern = this.engine.easternProfile(date);
    }
    return secondary;
  }
}

/**
 * One-shot form of {@link ProfileAggregator.aggregate}.
 */
export function aggregate(
  date: CalendarDate,
  birthDate: CalendarDate,
  engine: CalendricalEngine,
  secondaryProfiles: readonly SecondaryProfileKind[] = []
): DayProfile {
  return new ProfileAggregator(engine, { birthDate, secondaryProfiles }).aggregate(date);
}
