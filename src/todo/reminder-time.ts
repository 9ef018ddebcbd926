export interface QuickReminderOption {
  label: string;
  at: Date;
}

const MINUTE_MS = 60 * 1000;

// Accepted time formats: 14:30, 2:30 PM, 2:30PM, 14:30:00.
const TIME_24H = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const TIME_12H = /^(\d{1,2}):(\d{2})\s?([AaPp][Mm])$/;
const DATE_YMD = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

function parseClock(text: string): { hour: number; minute: number } | null {
  const t = text.trim();

  const m24 = TIME_24H.exec(t);
  if (m24) {
    const hour = Number(m24[1]);
    const minute = Number(m24[2]);
    const second = m24[3] === undefined ? 0 : Number(m24[3]);
    if (hour > 23 || minute > 59 || second > 59) return null;
    return { hour, minute };
  }

  const m12 = TIME_12H.exec(t);
  if (m12) {
    const h = Number(m12[1]);
    const minute = Number(m12[2]);
    if (h < 1 || h > 12 || minute > 59) return null;
    const pm = m12[3].toLowerCase() === 'pm';
    return { hour: (h % 12) + (pm ? 12 : 0), minute };
  }

  return null;
}

function parseYmd(text: string): { year: number; month: number; day: number } | null {
  const m = DATE_YMD.exec(text.trim());
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  // Reject dates that roll over, e.g. 2026-02-30.
  const probe = new Date(year, month - 1, day);
  if (probe.getFullYear() !== year || probe.getMonth() !== month - 1 || probe.getDate() !== day) return null;
  return { year, month, day };
}

/**
 * Parses a user-entered reminder time in the process's local time zone.
 * Seconds are dropped. Without a date the time refers to today, or to
 * tomorrow when it has already passed. Returns null for anything unparseable.
 */
export function parseReminderTime(time: string, date?: string, now: Date = new Date()): Date | null {
  const clock = parseClock(time);
  if (!clock) return null;

  if (date !== undefined && date.trim() !== '') {
    const ymd = parseYmd(date);
    if (!ymd) return null;
    return new Date(ymd.year, ymd.month - 1, ymd.day, clock.hour, clock.minute, 0, 0);
  }

  const at = new Date(now.getFullYear(), now.getMonth(), now.getDate(), clock.hour, clock.minute, 0, 0);
  if (at.getTime() <= now.getTime()) at.setDate(at.getDate() + 1);
  return at;
}

export function getQuickReminderOptions(now: Date = new Date()): QuickReminderOption[] {
  const todayAt17 = new Date(now.getFullYear(), now.getMonth(), now.getDate(), 17, 0, 0, 0);
  const tomorrowAt9 = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1, 9, 0, 0, 0);

  const options: QuickReminderOption[] = [
    { label: 'in 5 minutes', at: new Date(now.getTime() + 5 * MINUTE_MS) },
    { label: 'in 15 minutes', at: new Date(now.getTime() + 15 * MINUTE_MS) },
    { label: 'in 30 minutes', at: new Date(now.getTime() + 30 * MINUTE_MS) },
    { label: 'in 1 hour', at: new Date(now.getTime() + 60 * MINUTE_MS) },
    { label: 'today 17:00', at: todayAt17 },
    { label: 'tomorrow 09:00', at: tomorrowAt9 }
  ];

  return options.filter((o) => o.at.getTime() > now.getTime());
}
