import { ValidationError } from '@day-profile/shared/Types/errors';
import { WEEK_LENGTH } from '../profile/aggregator.js';
import type { CrowdSlice, DayProfile, ModeSlice, TrainingIntensity } from '../profile/schema.js';
import { block, bold, escapeMarkdown, SEPARATOR, type DetailLevel, type ReportBlock, type ReportDocument } from './document.js';

const INTENSITY_LABELS: Record<TrainingIntensity, string> = {
  recovery: 'восстановление',
  light: 'лёгкая',
  moderate: 'средняя',
  high: 'высокая',
};

function signed(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

function tzolkinLabel(slice: CrowdSlice): string {
  return `${slice.calendrical.tzolkinNumber} ${slice.calendrical.tzolkinName}`;
}

function calendricalBlock(slice: CrowdSlice): ReportBlock {
  const { haabDay, haabMonth } = slice.calendrical;
  return block('calendrical', `Майя: ${bold(tzolkinLabel(slice))} | Хааб: ${haabDay} ${escapeMarkdown(haabMonth)}`);
}

function lunarBlock(slice: CrowdSlice): ReportBlock {
  const { phaseName, age, illumination } = slice.lunar;
  return block(
    'lunar',
    `Луна: ${escapeMarkdown(phaseName)} (возраст ${age.toFixed(1)} дн., освещённость ${Math.round(illumination * 100)}%)`
  );
}

function classificationBlock(slice: ModeSlice): ReportBlock {
  const { label, description } = slice.classification;
  return block('classification', `Класс дня: ${bold(label)}`, escapeMarkdown(description));
}

function signalBlock(slice: ModeSlice): ReportBlock {
  const { tradingSignalLabel, tradingSignalDescription } = slice.classification;
  return block(
    'signal',
    `Торговый сигнал: ${bold(tradingSignalLabel)}`,
    escapeMarkdown(tradingSignalDescription)
  );
}

function crowdBlock(slice: CrowdSlice): ReportBlock {
  const { label, code, description } = slice.crowdState;
  return block('crowd', `Толпа: ${bold(label)} (${escapeMarkdown(code)})`, escapeMarkdown(description));
}

function botModeBlock(slice: ModeSlice): ReportBlock {
  const { label, code, description } = slice.botMode;
  return block(
    'botMode',
    `Режим бота: ${bold(label)} (${escapeMarkdown(code)})`,
    escapeMarkdown(description)
  );
}

function biorhythmBlock(profile: DayProfile): ReportBlock {
  const b = profile.biorhythm;
  return block(
    'biorhythm',
    '📊 *Биоритмы* (в %):',
    `Физический: ${b.physical} | Эмоциональный: ${b.emotional} | ` +
      `Интеллектуальный: ${b.intellectual} | Духовный: ${b.spiritual}`
  );
}

function detailBlocks(profile: DayProfile): ReportBlock[] {
  const { training, schedule, nutrition } = profile;
  const blocks: ReportBlock[] = [
    SEPARATOR,
    block(
      'training',
      `🏋️ *Тренировка:* ${escapeMarkdown(training.focus)} (${INTENSITY_LABELS[training.intensity]})`,
      escapeMarkdown(training.summary),
      ...training.exercises.map((exercise) => `• ${escapeMarkdown(exercise)}`)
    ),
    SEPARATOR,
    block(
      'schedule',
      `🕒 *Распорядок дня* (личный день ${schedule.personalDay} из 13):`,
      ...schedule.blocks.map((entry) => `${entry.time} ${escapeMarkdown(entry.activity)}`)
    ),
    SEPARATOR,
    block(
      'nutrition',
      `🥗 *Питание* (калории ${signed(nutrition.calorieAdjustment)}%):`,
      escapeMarkdown(nutrition.summary),
      ...nutrition.recommendations.map((item) => `• ${escapeMarkdown(item)}`)
    ),
  ];

  for (const secondary of [profile.secondary.sumerian, profile.secondary.eastern]) {
    if (secondary) {
      blocks.push(
        SEPARATOR,
        block(
          'secondary',
          `🏛 ${bold(`${secondary.system} профиль:`)} ${escapeMarkdown(secondary.label)}`,
          escapeMarkdown(secondary.description)
        )
      );
    }
  }
  return blocks;
}

/**
 * Day report. `full` appends training, schedule, nutrition and any
 * secondary calendar sections after the biorhythm summary.
 */
export function formatDay(profile: DayProfile, detail: DetailLevel): ReportDocument {
  const blocks: ReportBlock[] = [
    block('title', `📅 *День* ${profile.date}`),
    calendricalBlock(profile),
    lunarBlock(profile),
    SEPARATOR,
    classificationBlock(profile),
    SEPARATOR,
    signalBlock(profile),
    SEPARATOR,
    crowdBlock(profile),
    SEPARATOR,
    botModeBlock(profile),
    SEPARATOR,
    biorhythmBlock(profile),
  ];

  if (detail === 'full') {
    blocks.push(...detailBlocks(profile));
  }
  return { blocks };
}

/**
 * Week overview: one summary line per day, no detail sections.
 *
 * @throws ValidationError unless exactly seven profiles are given
 */
export function formatWeek(profiles: readonly DayProfile[]): ReportDocument {
  const first = profiles[0];
  const last = profiles[profiles.length - 1];
  if (profiles.length !== WEEK_LENGTH || !first || !last) {
    throw new ValidationError(`Week view needs ${WEEK_LENGTH} days, got ${profiles.length}`);
  }

  return {
    blocks: [
      block('weekHeader', `🗓 *Неделя* ${first.date} → ${last.date}`),
      SEPARATOR,
      ...profiles.map((p) =>
        block(
          'weekDay',
          `${p.date} · ${escapeMarkdown(tzolkinLabel(p))} · ${escapeMarkdown(p.classification.label)} · ${escapeMarkdown(p.botMode.code)} · ` +
            `Ф ${p.biorhythm.physical} / Э ${p.biorhythm.emotional}`
        )
      ),
    ],
  };
}

export function formatCrowd(slice: CrowdSlice): ReportDocument {
  return {
    blocks: [
      block('title', `👥 *Толпа* ${slice.date}`),
      calendricalBlock(slice),
      lunarBlock(slice),
      SEPARATOR,
      crowdBlock(slice),
      SEPARATOR,
      block('text', '*Сценарий:*', escapeMarkdown(slice.crowdState.scenario)),
    ],
  };
}

export function formatMode(slice: ModeSlice): ReportDocument {
  return {
    blocks: [
      block('title', `🤖 *Режим бота* ${slice.date}`),
      calendricalBlock(slice),
      lunarBlock(slice),
      SEPARATOR,
      signalBlock(slice),
      SEPARATOR,
      crowdBlock(slice),
      SEPARATOR,
      botModeBlock(slice),
    ],
  };
}

export interface CommandHelp {
  command: string;
  description: string;
}

export function formatHelp(commands: readonly CommandHelp[]): ReportDocument {
  return {
    blocks: [
      block('title', 'Привет! Я бот *Системы 4 Muluk*.'),
      SEPARATOR,
      block('text', 'Команды:', ...commands.map((c) => `/${escapeMarkdown(c.command)} — ${c.description}`)),
      SEPARATOR,
      block('text', 'Каждое утро я присылаю полный отчёт о дне.'),
    ],
  };
}
