export interface ResultRecord {
  id: number;
  artikul: string;
  client: string;
  quantity: number;
  weight: number;
  last_updated: string | null;
  brand: string;
  description: string;
  sale_price: number;
  total_price: number;
  created_at: string | null;
}

export interface ResultInput {
  artikul: string;
  client: string;
  quantity?: number;
  weight?: number;
  brand?: string;
  description?: string;
  sale_price?: number;
}

export const UPDATABLE_RESULT_FIELDS = [
  'artikul',
  'client',
  'quantity',
  'weight',
  'brand',
  'description',
  'sale_price',
  'total_price'
] as const;

export type UpdatableResultField = (typeof UPDATABLE_RESULT_FIELDS)[number];

export type ResultUpdate = Partial<Record<UpdatableResultField, string | number>>;

export interface UpsertOutcome {
  ok: true;
  action: 'inserted' | 'updated';
  id: number;
}

export interface CatalogInfo {
  exists: true;
  filename: string;
  size: number;
  uploaded_at: string;
  version: number;
}

export type CatalogInfoResponse = { ok: true } & (CatalogInfo | { exists: false });

export interface ServerStatus {
  status: 'ok';
  server: string;
  version: string;
}

export interface ConnectedEvent {
  type: 'connected';
  version: number;
  catalog?: {
    filename: string;
    size: number;
    version: number;
  };
}

export interface ResultsChangedEvent {
  type: 'results_changed';
  version: number;
}

export interface CatalogUploadedEvent {
  type: 'catalog_uploaded';
  filename: string;
  size: number;
  version: number;
}

export type SyncEvent = ConnectedEvent | ResultsChangedEvent | CatalogUploadedEvent;

/** Any decoded stream event; only the `SyncEvent` shapes get typed dispatch. */
export type SyncNotification = Record<string, unknown> & { type: string };

export type ApiResult<T> = ({ ok: true } & T) | { ok: false; error: string };
