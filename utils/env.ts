export function env(key: string, fallback?: string): string {
  if (typeof process !== 'undefined' && process.env && key in process.env) {
    const value = process.env[key];
    if (value !== undefined) {
      return value;
    }
  }

  if (fallback !== undefined) {
    return fallback;
  }

  return '';
}

export function envNumber(key: string, fallback: number): number {
  const raw = env(key);
  if (raw === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export function envFlag(key: string, fallback: boolean): boolean {
  const raw = env(key).trim().toLowerCase();
  if (raw === '') {
    return fallback;
  }
  return raw === 'true' || raw === '1' || raw === 'yes';
}
