import { ProductDocument } from '../types';

export interface ProductStore {
  get(key: string): Promise<ProductDocument | undefined>;
  upsert(key: string, document: ProductDocument): Promise<void>;
  /** Newest first by `timestamp`. */
  list(limit: number): Promise<ProductDocument[]>;
}

// In-memory storage; swap for a database-backed ProductStore in production.
export class InMemoryProductStore implements ProductStore {
  private readonly documents = new Map<string, ProductDocument>();

  async get(key: string): Promise<ProductDocument | undefined> {
    return this.documents.get(key);
  }

  async upsert(key: string, document: ProductDocument): Promise<void> {
    this.documents.set(key, document);
  }

  async list(limit: number): Promise<ProductDocument[]> {
    return Array.from(this.documents.values())
      .sort((a, b) => b.timestamp - a.timestamp)
      .slice(0, Math.max(0, limit));
  }
}
