export const clamp = (value: number, min: number, max: number): number =>
  Number.isNaN(value) ? min : Math.min(max, Math.max(min, value));

export const round4 = (value: number): number => Number(value.toFixed(4));

export const sum = (values: readonly number[]): number =>
  values.reduce((total, current) => total + current, 0);

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

export const wholeDaysBetween = (fromIso: string, now: Date): number | null => {
  const from = Date.parse(fromIso);
  if (Number.isNaN(from)) {
    return null;
  }

  return Math.floor((now.getTime() - from) / ONE_DAY_MS);
};
