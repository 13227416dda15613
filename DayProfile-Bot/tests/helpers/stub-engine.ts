import { vi } from 'vitest';
import { Logger } from '@day-profile/shared/Utils/logger';
import type { CalendricalEngine } from '../../src/engine/types.js';
import type { CalendarDate } from '../../src/profile/calendar-date.js';
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
} from '../../src/profile/schema.js';

export const TODAY: CalendarDate = { year: 2025, month: 11, day: 30 };
export const BIRTH_DATE: CalendarDate = { year: 1972, month: 11, day: 10 };

export const STUB_POSITION: CalendarPosition = { tzolkinNumber: 4, tzolkinName: 'Muluk', haabDay: 12, haabMonth: 'Keh' };
export const STUB_MOON: MoonPhase = {
  phaseCode: 'waxing_gibbous',
  phaseName: 'Растущая луна',
  age: 10.5,
  illumination: 0.8,
};
export const STUB_CLASSIFICATION: DayClassification = {
  level: 'high',
  label: 'Сильный день',
  description: 'Стабильная энергия.',
  tradingSignalLabel: 'Активная торговля',
  tradingSignalDescription: 'Обычный риск.',
};
export const STUB_CROWD: CrowdState = {
  code: 'greed',
  label: 'Жадность',
  description: 'Покупатели активны.',
  scenario: 'Импульс вверх.',
};
export const STUB_BOT_MODE: BotMode = { code: 'AGGRESSIVE', label: 'Агрессивный', description: 'Полный объём.' };
export const STUB_BIORHYTHMS: Biorhythms = { physical: 42, emotional: -17, intellectual: 88, spiritual: 5 };
export const STUB_TRAINING: TrainingPlan = {
  intensity: 'moderate',
  focus: 'Сила',
  summary: 'Рабочая нагрузка.',
  exercises: ['Присед', 'Тяга'],
};
export const STUB_SCHEDULE: DailySchedule = {
  personalDay: 7,
  blocks: [
    { time: '06:30', activity: 'Подъём' },
    { time: '23:00', activity: 'Сон' },
  ],
};
export const STUB_NUTRITION: NutritionProfile = {
  summary: 'Обычный рацион.',
  calorieAdjustment: 10,
  recommendations: ['Вода'],
};
export const STUB_SUMERIAN: SecondaryProfile = { system: 'Шумерский', label: 'Шамаш (Солнце)', description: 'День Шамаша.' };
export const STUB_EASTERN: SecondaryProfile = { system: 'Восточный', label: 'Дерево Дракон', description: 'Год дракона.' };

/**
 * Engine returning fixed values for every date, each method a spy.
 */
export function createStubEngine() {
  return {
    calendarPosition: vi.fn((_date: CalendarDate): CalendarPosition => STUB_POSITION),
    moonPhase: vi.fn((_date: CalendarDate): MoonPhase => STUB_MOON),
    classifyDay: vi.fn((_n: number, _name: string, _phase: MoonPhaseCode): DayClassification => STUB_CLASSIFICATION),
    crowdState: vi.fn((_n: number, _name: string, _phase: MoonPhaseCode): CrowdState => STUB_CROWD),
    botMode: vi.fn((_signal: string, _crowd: string): BotMode => STUB_BOT_MODE),
    biorhythms: vi.fn((_birth: CalendarDate, _date: CalendarDate): Biorhythms => STUB_BIORHYTHMS),
    trainingRecommendation: vi.fn(
      (_b: Biorhythms, _c: DayClassification, _p: MoonPhaseCode): TrainingPlan => STUB_TRAINING
    ),
    dailySchedule: vi.fn(
      (_birth: CalendarDate, _date: CalendarDate, _c: DayClassification, _p: MoonPhaseCode, _b: Biorhythms): DailySchedule =>
        STUB_SCHEDULE
    ),
    nutritionProfile: vi.fn(
      (_b: Biorhythms, _c: DayClassification, _p: MoonPhaseCode): NutritionProfile => STUB_NUTRITION
    ),
    sumerianProfile: vi.fn((_date: CalendarDate): SecondaryProfile => STUB_SUMERIAN),
    easternProfile: vi.fn((_date: CalendarDate): SecondaryProfile => STUB_EASTERN),
  } satisfies CalendricalEngine;
}

export type StubEngine = ReturnType<typeof createStubEngine>;

/** Logger whose output is swallowed; the methods stay spies for assertions. */
export function createTestLogger() {
  const logger = new Logger('test');
  return {
    logger,
    debug: vi.spyOn(logger, 'debug').mockImplementation(() => {}),
    info: vi.spyOn(logger, 'info').mockImplementation(() => {}),
    warn: vi.spyOn(logger, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(logger, 'error').mockImplementation(() => {}),
  };
}
