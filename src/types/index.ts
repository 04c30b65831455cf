export interface Dimensions {
  length: number;
  width: number;
  height: number;
}

export interface Item {
  sku: string;
  dimensions: Dimensions;
}

export interface BoxRow {
  box_id: string;
  length: number;
  width: number;
  height: number;
}

export interface BoxDefinition extends BoxRow {
  volume: number;
}

export interface BoxAssignment {
  box: BoxDefinition;
  items: string[];
}

export interface OversizedItem {
  sku: string;
  dimensions: Dimensions;
  max_box_inner_dimensions: Dimensions;
}

export type PackOutcome =
  | { ok: true; boxes: BoxAssignment[] }
  | { ok: false; error: 'item_too_large'; items: OversizedItem[] }
  | { ok: false; error: 'packing_error'; message: string };

export interface PackRequest {
  items: Item[];
}

export interface PackedBox {
  box_id: string;
  dimensions: Dimensions;
  items: string[];
}

export interface PackResponse {
  boxes: PackedBox[];
  total_boxes: number;
}

export interface FieldError {
  type: string;
  loc: Array<string | number>;
  msg: string;
  input?: unknown;
}

export interface ErrorBody {
  error: string;
  details?: unknown;
}

export interface AppConfig {
  port: number;
  jsonLimit: string;
  corsOrigins: string[];
  boxes: BoxRow[];
}
