import { SerialQueue } from "./lockFile";
import { TableJobStore, type StoreOptions } from "./jobStore";
import { emptyTable, type JobTable } from "./schema";

export class InMemoryJobStore extends TableJobStore {
  private table: JobTable = emptyTable();
  private readonly queue = new SerialQueue();

  constructor(options: StoreOptions = {}) {
    super(options);
  }

  protected transact<T>(write: boolean, fn: (table: JobTable) => T): Promise<T> {
    return this.queue.run(async () => {
      const draft = structuredClone(this.table);
      const result = fn(draft);
      if (write) {
        this.table = draft;
      }
      return result;
    });
  }
}
