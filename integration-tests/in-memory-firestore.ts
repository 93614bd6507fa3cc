type DocumentData = Record<string, unknown>;

interface SnapshotLike {
  id: string;
  data(): DocumentData;
}

interface Converter<T> {
  toFirestore(model: T): DocumentData;
  fromFirestore(snapshot: SnapshotLike): T;
}

class InMemoryDocument<T> {
  constructor(
    private docs: Map<string, DocumentData>,
    private id: string,
    private converter: Converter<T>
  ) {}

  async get() {
    const raw = this.docs.get(this.id);
    const id = this.id;
    return {
      id,
      exists: raw !== undefined,
      data: (): T | undefined => (raw === undefined ? undefined : this.converter.fromFirestore({ id, data: () => raw })),
    };
  }

  async set(model: T): Promise<void> {
    this.docs.set(this.id, this.converter.toFirestore(model));
  }

  // Same contract as Firestore: ALREADY_EXISTS (code 6) when the document is there
  async create(model: T): Promise<void> {
    if (this.docs.has(this.id)) {
      throw Object.assign(new Error(`6 ALREADY_EXISTS: Document already exists: ${this.id}`), { code: 6 });
    }
    this.docs.set(this.id, this.converter.toFirestore(model));
  }
}

/**
 * Just enough of Firestore for the relay stores: single documents read and written
 * through a converter.
 */
export class InMemoryFirestore {
  private collections = new Map<string, Map<string, DocumentData>>();

  private docs(name: string): Map<string, DocumentData> {
    let docs = this.collections.get(name);
    if (!docs) {
      docs = new Map();
      this.collections.set(name, docs);
    }
    return docs;
  }

  collection(name: string) {
    const docs = this.docs(name);
    return {
      withConverter: <T>(converter: Converter<T>) => ({
        doc: (id: string) => new InMemoryDocument<T>(docs, id, converter),
      }),
    };
  }

  seed(collection: string, id: string, data: DocumentData): void {
    this.docs(collection).set(id, data);
  }

  raw(collection: string, id: string): DocumentData | undefined {
    return this.docs(collection).get(id);
  }

  clear(): void {
    this.collections.clear();
  }
}
