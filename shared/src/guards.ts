import type { CatalogInfo, ResultRecord, SyncEvent } from './types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isResultRecord(value: unknown): value is ResultRecord {
  return (
    isRecord(value) &&
    isNumber(value.id) &&
    typeof value.artikul === 'string' &&
    typeof value.client === 'string' &&
    isNumber(value.quantity)
  );
}

export function isCatalogInfo(value: unknown): value is CatalogInfo {
  return (
    isRecord(value) &&
    value.exists === true &&
    typeof value.filename === 'string' &&
    isNumber(value.size) &&
    isNumber(value.version)
  );
}

export function isSyncEvent(value: unknown): value is SyncEvent {
  if (!isRecord(value) || !isNumber(value.version)) {
    return false;
  }

  switch (value.type) {
    case 'results_changed':
      return true;
    case 'catalog_uploaded':
      return typeof value.filename === 'string' && isNumber(value.size);
    case 'connected':
      return value.catalog === undefined || (isRecord(value.catalog) && typeof value.catalog.filename === 'string');
    default:
      return false;
  }
}
