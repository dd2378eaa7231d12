const DAY_MS = 24 * 60 * 60 * 1000;

export const startOfUtcDay = (date: Date) =>
  new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

export const addDays = (date: Date, days: number) => new Date(date.getTime() + days * DAY_MS);

export const formatDay = (date: Date) => date.toISOString().slice(0, 10);

export const parseDay = (value: string) => {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, yyyy, mm, dd] = match;
  const date = new Date(Date.UTC(Number(yyyy), Number(mm) - 1, Number(dd)));
  return formatDay(date) === value.trim() ? date : null;
};

export const toUnixSeconds = (date: Date) => Math.floor(date.getTime() / 1000);
