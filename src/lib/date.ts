interface DateTimeParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
  timeZoneName: string;
}

function toDate(value: string | Date | undefined): Date | undefined {
  if (value === undefined) {
    return undefined;
  }

  const date = typeof value === "string" ? new Date(value) : value;
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function dateTimeParts(date: Date, timeZone?: string): DateTimeParts {
  const parts = new Intl.DateTimeFormat("en-US", {
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
    timeZoneName: "short",
    timeZone,
  }).formatToParts(date);

  const pick = (type: Intl.DateTimeFormatPartTypes): string => parts.find((part) => part.type === type)?.value ?? "";

  return {
    year: pick("year"),
    month: pick("month"),
    day: pick("day"),
    hour: pick("hour"),
    minute: pick("minute"),
    second: pick("second"),
    timeZoneName: pick("timeZoneName"),
  };
}

/** `YYYY-MM-DD HH:mm:ss`, in the local zone unless `timeZone` is given. */
export function formatDateTime(value: string | Date | undefined, timeZone?: string): string {
  const date = toDate(value);
  if (!date) {
    return "";
  }

  const p = dateTimeParts(date, timeZone);
  return `${p.year}-${p.month}-${p.day} ${p.hour}:${p.minute}:${p.second}`;
}

export function formatResetTimestamp(value: string | Date | undefined, timeZone?: string): string {
  const date = toDate(value);
  if (!date) {
    return "";
  }

  const zone = dateTimeParts(date, timeZone).timeZoneName;
  const formatted = formatDateTime(date, timeZone);
  return zone ? `${formatted} ${zone}` : formatted;
}

export function formatRemainingDaysHours(value?: string, referenceTimeMs = Date.now()): string {
  if (!value) {
    return "";
  }

  const targetMs = Date.parse(value);
  if (Number.isNaN(targetMs)) {
    return "";
  }

  const deltaMs = targetMs - referenceTimeMs;
  if (deltaMs <= 0) {
    return "0d 0h";
  }

  const totalHours = Math.floor(deltaMs / (1000 * 60 * 60));
  const days = Math.floor(totalHours / 24);
  const hours = totalHours % 24;
  return `${days}d ${hours}h`;
}
