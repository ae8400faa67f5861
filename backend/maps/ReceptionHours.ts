import type { ReceptionHours, ReceptionStatus, ReceptionWindow, Weekday } from "../domain/Clinic";

// Outpatient reception timetable lookup (Asia/Tokyo).
// Answers "is reception open right now according to the published hours".
// It does not estimate waiting time or congestion.

export const WEEKDAYS: readonly Weekday[] = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"];

const WEEKDAY_LABELS: Readonly<Record<Weekday, string>> = {
  sun: "Sun",
  mon: "Mon",
  tue: "Tue",
  wed: "Wed",
  thu: "Thu",
  fri: "Fri",
  sat: "Sat",
};

// JST has no daylight saving time.
const TOKYO_OFFSET_MS = 9 * 60 * 60 * 1000;
const MINUTES_PER_DAY = 24 * 60;

// Accepts "9:30", "09:30", "930", "0930". Returns minutes since midnight.
export function parseHhmm(raw: unknown): number | null {
  if (raw === null || raw === undefined) return null;
  const s = String(raw).trim();
  if (!s) return null;

  let hh: number;
  let mm: number;
  if (s.includes(":")) {
    const [h, m] = s.split(":");
    hh = Number(h);
    mm = Number(m);
  } else {
    let digits = s.replace(/\D/g, "");
    if (digits.length === 3) digits = `0${digits}`;
    if (digits.length !== 4) return null;
    hh = Number(digits.slice(0, 2));
    mm = Number(digits.slice(2));
  }

  if (!Number.isInteger(hh) || !Number.isInteger(mm) || hh < 0 || hh > 23 || mm < 0 || mm > 59) return null;
  return hh * 60 + mm;
}

export function formatHhmm(minutes: number): string {
  const m = ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  return `${String(Math.floor(m / 60)).padStart(2, "0")}:${String(m % 60).padStart(2, "0")}`;
}

export function toReceptionWindow(start: unknown, end: unknown): ReceptionWindow | undefined {
  const s = parseHhmm(start);
  const e = parseHhmm(end);
  if (s === null || e === null) return undefined;
  return { start: formatHhmm(s), end: formatHhmm(e) };
}

type TokyoClock = Readonly<{ weekdayIndex: number; minutes: number }>;

export function tokyoClock(now: Date): TokyoClock {
  const shifted = new Date(now.getTime() + TOKYO_OFFSET_MS);
  return { weekdayIndex: shifted.getUTCDay(), minutes: shifted.getUTCHours() * 60 + shifted.getUTCMinutes() };
}

// Window bounds in minutes relative to that day's midnight; an end at or
// before the start crosses midnight.
function windowBounds(w: ReceptionWindow): { start: number; end: number } | null {
  const start = parseHhmm(w.start);
  const end = parseHhmm(w.end);
  if (start === null || end === null) return null;
  return { start, end: end <= start ? end + MINUTES_PER_DAY : end };
}

export type ReceptionSnapshot = Readonly<{
  status: ReceptionStatus;
  minutesToClose: number | null;
  nextReceptionLabel: string | null;
}>;

export function receptionStatusAt(hours: ReceptionHours, now: Date, closingSoonThresholdMinutes: number): ReceptionSnapshot {
  const known = WEEKDAYS.some((d) => hours[d] !== undefined);
  if (!known) return { status: "unknown", minutesToClose: null, nextReceptionLabel: null };

  const clock = tokyoClock(now);
  const todayWindow = hours[WEEKDAYS[clock.weekdayIndex]];
  const today = todayWindow ? windowBounds(todayWindow) : null;

  if (today && clock.minutes >= today.start && clock.minutes <= today.end) {
    const minutesToClose = today.end - clock.minutes;
    return {
      status: minutesToClose <= closingSoonThresholdMinutes ? "closing-soon" : "open",
      minutesToClose,
      nextReceptionLabel: null,
    };
  }

  return { status: "closed", minutesToClose: null, nextReceptionLabel: nextReceptionLabel(hours, clock) };
}

function nextReceptionLabel(hours: ReceptionHours, clock: TokyoClock): string | null {
  for (let offset = 0; offset < 7; offset++) {
    const day = WEEKDAYS[(clock.weekdayIndex + offset) % 7];
    const w = hours[day];
    const bounds = w ? windowBounds(w) : null;
    if (!bounds) continue;

    if (offset === 0) {
      if (clock.minutes < bounds.start) return `today ${formatHhmm(bounds.start)}`;
      continue;
    }
    const dayLabel = offset === 1 ? "tomorrow" : WEEKDAY_LABELS[day];
    return `${dayLabel} ${formatHhmm(bounds.start)}`;
  }
  return null;
}
