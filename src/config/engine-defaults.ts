import 'dotenv/config';

const selectFirstValue = (...candidates: Array<string | undefined | null>): string | null => {
  for (const candidate of candidates) {
    if (typeof candidate === 'string') {
      const trimmed = candidate.trim();
      if (trimmed.length > 0) {
        return trimmed;
      }
    }
  }
  return null;
};

const resolveString = (fallback: string, ...candidates: Array<string | undefined | null>): string =>
  selectFirstValue(...candidates) ?? fallback;

// Unparseable values fall back to the default; the rules schema rejects them on explicit input.
const resolveInteger = (
  fallback: number | null,
  ...candidates: Array<string | undefined | null>
): number | null => {
  const provided = selectFirstValue(...candidates);
  if (!provided) {
    return fallback;
  }
  const parsed = Number(provided);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
};

const resolveBoolean = (fallback: boolean, ...candidates: Array<string | undefined | null>): boolean => {
  const provided = selectFirstValue(...candidates);
  if (!provided) {
    return fallback;
  }
  const normalized = provided.toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const resolveList = (...candidates: Array<string | undefined | null>): string[] => {
  const provided = selectFirstValue(...candidates);
  if (!provided) {
    return [];
  }
  return provided
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
};

export const ENGINE_DEFAULTS = {
  FORMAT: resolveString('Standard', process.env.PTCG_FORMAT),
  PRIZE_CARDS: resolveInteger(6, process.env.PTCG_PRIZE_CARDS) ?? 6,
  MAX_HAND_SIZE: resolveInteger(null, process.env.PTCG_MAX_HAND_SIZE),
  TURN_TIME_LIMIT: resolveInteger(null, process.env.PTCG_TURN_TIME_LIMIT, process.env.PTCG_TURN_TIME_LIMIT_SECONDS),
  AUTO_SHUFFLE: resolveBoolean(true, process.env.PTCG_AUTO_SHUFFLE),
  LOG_LEVEL: resolveString('info', process.env.LOG_LEVEL),
  LOG_SILENT: resolveBoolean(false, process.env.LOG_SILENT),
  SUPPRESSED_LOG_TAGS: resolveList(process.env.LOG_SUPPRESSED_TAGS)
};

export type EngineDefaultKey = keyof typeof ENGINE_DEFAULTS;
