import {
  MONTH_CODES,
  PRAYER_TIME_KEYS,
  type CalendarYear,
  type DayRecord,
  type MonthBucket,
  type MonthCode,
  type PrayerTimes
} from "@/types/calendar";
import { padTwo } from "@/lib/utils/calendar";

export interface DayPatch {
  day: number;
  weekday?: string;
  festival?: string;
  times?: Partial<PrayerTimes>;
}

export function createEmptyPrayerTimes(): PrayerTimes {
  return {
    imsaku: "",
    sabahu: "",
    lindja_e_diellit: "",
    dreka: "",
    ikindia: "",
    akshami: "",
    jacia: "",
    gjatesia_e_dites: ""
  };
}

export function createEmptyYear(): CalendarYear {
  return {
    "01": {},
    "02": {},
    "03": {},
    "04": {},
    "05": {},
    "06": {},
    "07": {},
    "08": {},
    "09": {},
    "10": {},
    "11": {},
    "12": {}
  };
}

/**
 * Writes the non-empty parts of a patch into the bucket. Empty values never clear what an earlier
 * write stored, so replaying the same patches leaves the bucket unchanged.
 */
export function upsertDayRecord(bucket: MonthBucket, patch: DayPatch): DayRecord {
  const dayCode = padTwo(patch.day);
  const record: DayRecord = bucket[dayCode] ?? {
    data_sipas_kal_boteror: patch.day,
    dita_javes: "",
    festat_fetare_dhe_shenime_te_tjera_astronomike: "",
    kohet: createEmptyPrayerTimes()
  };

  if (patch.weekday) {
    record.dita_javes = patch.weekday;
  }
  if (patch.festival) {
    record.festat_fetare_dhe_shenime_te_tjera_astronomike = patch.festival;
  }
  for (const key of PRAYER_TIME_KEYS) {
    const value = patch.times?.[key];
    if (value) {
      record.kohet[key] = value;
    }
  }

  bucket[dayCode] = record;
  return record;
}

/** True when at least one record of the bucket carries a prayer time. */
export function hasPrayerTimes(bucket: MonthBucket): boolean {
  return Object.values(bucket).some((record) => PRAYER_TIME_KEYS.some((key) => Boolean(record.kohet[key])));
}

export function countDays(year: CalendarYear): Record<MonthCode, number> {
  const counts = emptyCounts();
  for (const month of MONTH_CODES) {
    counts[month] = Object.keys(year[month]).length;
  }
  return counts;
}

function emptyCounts(): Record<MonthCode, number> {
  return {
    "01": 0,
    "02": 0,
    "03": 0,
    "04": 0,
    "05": 0,
    "06": 0,
    "07": 0,
    "08": 0,
    "09": 0,
    "10": 0,
    "11": 0,
    "12": 0
  };
}

export function freezeCalendarYear(year: CalendarYear): CalendarYear {
  for (const month of MONTH_CODES) {
    for (const record of Object.values(year[month])) {
      Object.freeze(record.kohet);
      Object.freeze(record);
    }
    Object.freeze(year[month]);
  }
  return Object.freeze(year);
}
