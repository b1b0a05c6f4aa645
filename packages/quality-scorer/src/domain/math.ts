export const round1 = (value: number): number => Number(value.toFixed(1));

export const average = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }

  const total = values.reduce((sum, current) => sum + current, 0);
  return total / values.length;
};

export const clampToCeiling = (value: number, ceiling: number): number =>
  Number.isFinite(value) ? Math.min(ceiling, Math.max(0, value)) : 0;
