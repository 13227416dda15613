import { daysBetween, type CalendarDate } from '../profile/calendar-date.js';
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
import { DayLevelSchema } from '../profile/schema.js';
import type { CalendricalEngine } from './types.js';
import { calendarPosition } from './maya.js';
import { lunarState } from './moon.js';
import { biorhythms } from './biorhythm.js';
import { easternProfile, sumerianProfile } from './secondary.js';
import {
  calorieAdjustment,
  crowdFromScore,
  levelFromScore,
  loadInterpretationTables,
  trainingIntensity,
  trecenaCrowdBias,
  type InterpretationTables,
} from './interpretation.js';

/**
 * Built-in calendrical engine: Maya calendar by the GMT correlation, mean
 * lunar phase, sine biorhythms and table-driven interpretation rules.
 */
export class ReferenceEngine implements CalendricalEngine {
  private tables: InterpretationTables;

  constructor(tables: InterpretationTables = loadInterpretationTables()) {
    this.tables = tables;
  }

  calendarPosition(date: CalendarDate): CalendarPosition {
    return calendarPosition(date);
  }

  moonPhase(date: CalendarDate): MoonPhase {
    const state = lunarState(date);
    return {
      phaseCode: state.phaseCode,
      phaseName: this.phaseEntry(state.phaseCode).name,
      age: state.age,
      illumination: state.illumination,
    };
  }

  classifyDay(tzolkinNumber: number, tzolkinName: string, phaseCode: MoonPhaseCode): DayClassification {
    const score =
      this.numberEnergy(tzolkinNumber) +
      this.sign(tzolkinName).polarity +
      this.phaseEntry(phaseCode).classBias;
    const level = levelFromScore(score);
    const entry = this.tables.levels[level];

    return {
      level,
      label: entry.label,
      description: `${entry.description} Знак ${tzolkinName}: ${this.sign(tzolkinName).keyword}.`,
      tradingSignalLabel: entry.tradingSignal.label,
      tradingSignalDescription: entry.tradingSignal.description,
    };
  }

  crowdState(tzolkinNumber: number, tzolkinName: string, phaseCode: MoonPhaseCode): CrowdState {
    const score =
      trecenaCrowdBias(tzolkinNumber) +
      this.sign(tzolkinName).crowd +
      this.phaseEntry(phaseCode).crowdBias;
    const code = crowdFromScore(score);
    const entry = this.tables.crowdStates[code];

    return { code, label: entry.label, description: entry.description, scenario: entry.scenario };
  }

  botMode(tradingSignalLabel: string, crowdCode: string): BotMode {
    const level = DayLevelSchema.options.find(
      (candidate) => this.tables.levels[candidate].tradingSignal.label === tradingSignalLabel
    );

    let code = this.tables.fallbackBotMode;
    if (level) {
      const row: Record<string, string> = this.tables.botModeMatrix[level];
      code = row[crowdCode] ?? this.tables.fallbackBotMode;
    }

    const mode = this.tables.botModes[code];
    if (!mode) {
      throw new Error(`Bot mode ${code} missing from tables`);
    }
    return { code, label: mode.label, description: mode.description };
  }

  biorhythms(birthDate: CalendarDate, date: CalendarDate): Biorhythms {
    return biorhythms(birthDate, date);
  }

  trainingRecommendation(
    bior: Biorhythms,
    classification: DayClassification,
    phaseCode: MoonPhaseCode
  ): TrainingPlan {
    const intensity = trainingIntensity(bior.physical, classification.level, phaseCode);
    const entry = this.tables.training[intensity];
    return { intensity, focus: entry.focus, summary: entry.summary, exercises: [...entry.exercises] };
  }

  dailySchedule(
    birthDate: CalendarDate,
    date: CalendarDate,
    classification: DayClassification,
    phaseCode: MoonPhaseCode,
    bior: Biorhythms
  ): DailySchedule {
    const s = this.tables.schedule;
    const active = bior.physical >= 0 && classification.level !== 'low';
    const restful = phaseCode === 'new' || phaseCode === 'full';
    const personalDay = (((daysBetween(birthDate, date) % 13) + 13) % 13) + 1;

    return {
      personalDay,
      blocks: [
        active ? { time: '06:30', activity: s.wakeActive } : { time: '07:30', activity: s.wakeSoft },
        { time: '09:00', activity: bior.intellectual >= 0 ? s.focusWork : s.routineWork },
        { time: '11:00', activity: s.tradingByLevel[classification.level] },
        bior.physical >= 0 ? { time: '17:00', activity: s.training } : { time: '18:30', activity: s.walk },
        { time: '21:00', activity: bior.emotional < 0 ? s.eveningQuiet : s.eveningSocial },
        restful ? { time: '22:00', activity: s.sleepEarly } : { time: '23:00', activity: s.sleep },
      ],
    };
  }

  nutritionProfile(
    bior: Biorhythms,
    classification: DayClassification,
    phaseCode: MoonPhaseCode
  ): NutritionProfile {
    const n = this.tables.nutrition;
    const phaseAdvice = n.byPhase[phaseCode];
    return {
      summary: n.summaryByLevel[classification.level],
      calorieAdjustment: calorieAdjustment(bior.physical, phaseCode),
      recommendations: phaseAdvice ? [...n.base, phaseAdvice] : [...n.base],
    };
  }

  sumerianProfile(date: CalendarDate): SecondaryProfile {
    return sumerianProfile(date);
  }

  easternProfile(date: CalendarDate): SecondaryProfile {
    return easternProfile(date);
  }

  private sign(name: string): InterpretationTables['tzolkinSigns'][string] {
    const entry = this.tables.tzolkinSigns[name];
    if (!entry) {
      throw new Error(`Unknown tzolkin sign ${name}`);
    }
    return entry;
  }

  private numberEnergy(tzolkinNumber: number): number {
    const energy = this.tables.numberEnergy[tzolkinNumber - 1];
    if (energy === undefined) {
      throw new Error(`Tzolkin number out of range: ${tzolkinNumber}`);
    }
    return energy;
  }

  private phaseEntry(code: MoonPhaseCode): NonNullable<InterpretationTables['moonPhases'][MoonPhaseCode]> {
    const entry = this.tables.moonPhases[code];
    if (!entry) {
      throw new Error(`Moon phase ${code} missing from tables`);
    }
    return entry;
  }
}
