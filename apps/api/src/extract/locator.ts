import { isRecord } from '../utils/values';

// n8n parameters are either plain strings or resource locators
// ({ __rl: true, mode, value, cachedResultName }).
export type LocatorValue =
  | { kind: 'text'; text: string }
  | { kind: 'locator'; cachedResultName?: string; value?: string };

const scalarText = (value: unknown): string | undefined => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
};

export const toLocatorValue = (raw: unknown): LocatorValue | null => {
  const text = scalarText(raw);
  if (text !== undefined) return { kind: 'text', text };
  if (isRecord(raw)) {
    return {
      kind: 'locator',
      cachedResultName: scalarText(raw.cachedResultName),
      value: scalarText(raw.value)
    };
  }
  return null;
};

export const resolveLocator = (locator: LocatorValue | null): string => {
  if (!locator) return '';
  switch (locator.kind) {
    case 'text':
      return locator.text;
    case 'locator':
      return locator.cachedResultName || locator.value || '';
  }
};

export const resolveParameter = (raw: unknown) => resolveLocator(toLocatorValue(raw));
