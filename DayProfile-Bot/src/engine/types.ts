import type { CalendarDate } from '../profile/calendar-date.js';
import type {
  Biorhythms,
  BotMode,
  CalendarPosition,
  CrowdState,
  DailySchedule,
  DayClassification,
  MoonPhase,
  MoonPhaseCode,
  NutritionProfile,
  SecondaryProfile,
  TrainingPlan,
} from '../profile/schema.js';

/**
 * Calendrical engine contract consumed by the profile aggregator.
 *
 * Every function must be pure and total over valid calendar dates. The
 * aggregator checks the shape of what comes back but never the numbers.
 */
export interface CalendricalEngine {
  calendarPosition(date: CalendarDate): CalendarPosition;
  moonPhase(date: CalendarDate): MoonPhase;

  classifyDay(tzolkinNumber: number, tzolkinName: string, phaseCode: MoonPhaseCode): DayClassification;
  /** Crowd state; `scenario` is the deep-profile narrative for the same triple. */
  crowdState(tzolkinNumber: number, tzolkinName: string, phaseCode: MoonPhaseCode): CrowdState;
  botMode(tradingSignalLabel: string, crowdCode: string): BotMode;

  biorhythms(birthDate: CalendarDate, date: CalendarDate): Biorhythms;
  trainingRecommendation(
    biorhythms: Biorhythms,
    classification: DayClassification,
    phaseCode: MoonPhaseCode
  ): TrainingPlan;
  dailySchedule(
    birthDate: CalendarDate,
    date: CalendarDate,
    classification: DayClassification,
    phaseCode: MoonPhaseCode,
    biorhythms: Biorhythms
  ): DailySchedule;
  nutritionProfile(
    biorhythms: Biorhythms,
    classification: DayClassification,
    phaseCode: MoonPhaseCode
  ): NutritionProfile;

  sumerianProfile(date: CalendarDate): SecondaryProfile;
  easternProfile(date: CalendarDate): SecondaryProfile;
}
