// pack() turns this into a packing_error outcome
export class PackingError extends Error {
  readonly sku: string;

  constructor(sku: string) {
    super(`Item '${sku}' does not fit in any available box.`);
    this.name = 'PackingError';
    this.sku = sku;
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}
