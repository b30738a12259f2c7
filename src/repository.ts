/**
 * Repository is a typed view of the Executor bound to one mapped class.
 *
 * It holds no state of its own: every call goes through the executor, so
 * it opens its own session and honors `useTransactions` like any other call.
 */

import type { Executor } from "./executor";
import type { EntityClass, IRepository, Parameters } from "./types";

export class Repository<T extends object> implements IRepository<T> {
  constructor(
    private entity: EntityClass<T>,
    private executor: Executor
  ) {}

  /** All rows of the table */
  find(): T[] {
    return this.executor.retrieve(this.entity);
  }

  /** Rows returned by a query or registered procedure */
  retrieve(text: string, params?: Parameters): T[] {
    return this.executor.retrieve(this.entity, text, params);
  }

  findById(id: unknown): T | undefined {
    return this.executor.findById(this.entity, id);
  }

  create(items: T | readonly T[]): boolean {
    return this.executor.create(items);
  }

  update(entity: T): number {
    return this.executor.update(entity);
  }

  delete(entity: T): boolean {
    return this.executor.delete(entity);
  }

  count(): number {
    return this.executor.count(this.entity);
  }
}
