export function formatNumber(value: number): string {
  return value.toLocaleString('en-US');
}

export function formatPercentage(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function pluralize(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${formatNumber(count)} ${count === 1 ? singular : plural}`;
}
