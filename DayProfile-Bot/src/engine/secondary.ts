import { dayOfWeek, type CalendarDate } from '../profile/calendar-date.js';
import type { SecondaryProfile } from '../profile/schema.js';

interface PlanetaryRuler {
  deity: string;
  planet: string;
  theme: string;
}

/** Babylonian planetary rulers of the weekday, Sunday first. */
const PLANETARY_RULERS: readonly PlanetaryRuler[] = [
  { deity: 'Шамаш', planet: 'Солнце', theme: 'справедливость, ясность и публичные дела' },
  { deity: 'Син', planet: 'Луна', theme: 'память, семья и внутренние циклы' },
  { deity: 'Нергал', planet: 'Марс', theme: 'борьба, натиск и сила воли' },
  { deity: 'Набу', planet: 'Меркурий', theme: 'письмо, счёт и переговоры' },
  { deity: 'Мардук', planet: 'Юпитер', theme: 'власть, порядок и расширение' },
  { deity: 'Иштар', planet: 'Венера', theme: 'любовь, красота и союзы' },
  { deity: 'Нинурта', planet: 'Сатурн', theme: 'границы, дисциплина и завершение' },
];

const ZODIAC_ANIMALS = [
  'Крыса', 'Бык', 'Тигр', 'Кролик', 'Дракон', 'Змея',
  'Лошадь', 'Коза', 'Обезьяна', 'Петух', 'Собака', 'Свинья',
] as const;

const ELEMENTS = ['Дерево', 'Огонь', 'Земля', 'Металл', 'Вода'] as const;

/** Lichun: the solar year of the Chinese calendar turns on 4 February. */
const SOLAR_NEW_YEAR = { month: 2, day: 4 };

function mod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

export function sumerianProfile(date: CalendarDate): SecondaryProfile {
  const ruler = PLANETARY_RULERS[dayOfWeek(date)];
  return {
    system: 'Шумерский',
    label: `${ruler.deity} (${ruler.planet})`,
    description: `День под покровительством ${ruler.deity}: ${ruler.theme}.`,
  };
}

export function easternProfile(date: CalendarDate): SecondaryProfile {
  const beforeNewYear =
    date.month < SOLAR_NEW_YEAR.month ||
    (date.month === SOLAR_NEW_YEAR.month && date.day < SOLAR_NEW_YEAR.day);
  const year = beforeNewYear ? date.year - 1 : date.year;

  const animal = ZODIAC_ANIMALS[mod(year - 4, 12)];
  const element = ELEMENTS[Math.floor(mod(year - 4, 10) / 2)];
  const polarity = mod(year, 2) === 0 ? 'Ян' : 'Инь';

  return {
    system: 'Восточный',
    label: `${element} ${animal}`,
    description: `Год ${animal.toLowerCase()} стихии «${element}» (${polarity}).`,
  };
}
