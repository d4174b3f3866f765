import { v4 as uuidv4 } from 'uuid';
import { EntityTarget, FindOperator } from 'typeorm';

type Direction = 'ASC' | 'DESC';
type Where = Record<string, unknown>;

export interface FindLike {
  where?: Where | Where[];
  order?: Record<string, Direction>;
  skip?: number;
  take?: number;
}

/** A unique index named the way the migration names it. */
export interface NamedUniqueConstraint {
  name: string;
  columns: string[];
}

export interface InMemoryRepositoryOptions<T> {
  /** Column groups that must be unique across rows. */
  unique?: (string[] | NamedUniqueConstraint)[];
  /** Values the database would fill in on insert. */
  defaults?: () => Partial<T>;
  primaryKey?: string;
}

export class UniqueViolationError extends Error {
  readonly code = '23505';

  constructor(
    columns: string[],
    readonly constraint?: string,
  ) {
    super(`duplicate key value violates unique constraint ${constraint ?? `(${columns.join(', ')})`}`);
  }
}

function sameValue(left: unknown, right: unknown): boolean {
  if (left instanceof Date && right instanceof Date) {
    return left.getTime() === right.getTime();
  }
  return left === right;
}

function toComparable(value: unknown): number | string {
  if (value instanceof Date) {
    return value.getTime();
  }
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  return String(value);
}

function matchesOperator(actual: unknown, operator: FindOperator<unknown>): boolean {
  const expected: unknown = operator.value;

  switch (operator.type) {
    case 'in':
      return Array.isArray(expected) && expected.some((candidate) => sameValue(actual, candidate));
    case 'lessThan':
      return actual !== null && actual !== undefined && toComparable(actual) < toComparable(expected);
    case 'moreThan':
      return actual !== null && actual !== undefined && toComparable(actual) > toComparable(expected);
    case 'isNull':
      return actual === null || actual === undefined;
    case 'not':
      return expected instanceof FindOperator ? !matchesOperator(actual, expected) : !sameValue(actual, expected);
    case 'ilike': {
      const pattern = String(expected)
        .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
        .replace(/%/g, '.*');
      return typeof actual === 'string' && new RegExp(`^${pattern}$`, 'i').test(actual);
    }
    default:
      throw new Error(`InMemoryRepository does not support the ${operator.type} operator`);
  }
}

function matches(row: object, where: Where | Where[] | undefined): boolean {
  if (!where) {
    return true;
  }
  if (Array.isArray(where)) {
    return where.some((clause) => matches(row, clause));
  }
  return Object.entries(where).every(([key, expected]) => {
    const actual: unknown = Reflect.get(row, key);
    if (expected instanceof FindOperator) {
      return matchesOperator(actual, expected);
    }
    return sameValue(actual, expected);
  });
}

/**
 * Array-backed stand-in for a TypeORM Repository, covering the calls the
 * services make. Rows are copied on the way in and out so that unsaved
 * changes never leak into storage.
 */
export class InMemoryRepository<T extends object> {
  private rows: T[] = [];
  private readonly primaryKey: string;

  constructor(
    private readonly factory: () => T,
    private readonly options: InMemoryRepositoryOptions<T> = {},
  ) {
    this.primaryKey = options.primaryKey ?? 'id';
  }

  get all(): T[] {
    return this.rows.map((row) => this.copy(row));
  }

  create(data: Partial<T> = {}): T {
    return Object.assign(this.factory(), data);
  }

  async save(entity: T): Promise<T> {
    const now = new Date();
    if (Reflect.get(entity, this.primaryKey) === undefined) {
      Reflect.set(entity, this.primaryKey, uuidv4());
    }

    const index = this.indexOf(entity);
    if (index === -1) {
      const defaults = this.options.defaults?.() ?? {};
      for (const [key, value] of Object.entries(defaults)) {
        if (Reflect.get(entity, key) === undefined) {
          Reflect.set(entity, key, value);
        }
      }
      this.assertUnique(entity);
      this.rows.push(this.copy(entity));
    } else {
      this.assertUnique(entity);
      this.rows[index] = this.copy(entity);
    }

    if ('updated_at' in entity) {
      Reflect.set(entity, 'updated_at', now);
    }
    return entity;
  }

  async findOne(options: { where: Where | Where[]; order?: Record<string, Direction> }): Promise<T | null> {
    const [first] = await this.find({ ...options, take: 1 });
    return first ?? null;
  }

  async findOneBy(where: Where | Where[]): Promise<T | null> {
    return this.findOne({ where });
  }

  async find(options: FindLike = {}): Promise<T[]> {
    const [rows] = await this.findAndCount(options);
    return rows;
  }

  async findBy(where: Where | Where[]): Promise<T[]> {
    return this.find({ where });
  }

  async findAndCount(options: FindLike = {}): Promise<[T[], number]> {
    let result = this.rows.filter((row) => matches(row, options.where));
    const total = result.length;

    if (options.order) {
      const order = Object.entries(options.order);
      result = [...result].sort((left, right) => {
        for (const [key, direction] of order) {
          const a = toComparable(Reflect.get(left, key));
          const b = toComparable(Reflect.get(right, key));
          if (a !== b) {
            const ascending = a < b ? -1 : 1;
            return direction === 'DESC' ? -ascending : ascending;
          }
        }
        return 0;
      });
    }

    const skip = options.skip ?? 0;
    const sliced = options.take === undefined ? result.slice(skip) : result.slice(skip, skip + options.take);
    return [sliced.map((row) => this.copy(row)), total];
  }

  async count(options: { where?: Where | Where[] } = {}): Promise<number> {
    return this.rows.filter((row) => matches(row, options.where)).length;
  }

  async countBy(where: Where | Where[]): Promise<number> {
    return this.count({ where });
  }

  async update(criteria: string | Where, partial: Partial<T>): Promise<{ affected: number }> {
    const where = typeof criteria === 'string' ? { [this.primaryKey]: criteria } : criteria;
    let affected = 0;
    this.rows = this.rows.map((row) => {
      if (!matches(row, where)) {
        return row;
      }
      affected += 1;
      return Object.assign(this.copy(row), partial);
    });
    return { affected };
  }

  async delete(criteria: string | Where): Promise<{ affected: number }> {
    const where = typeof criteria === 'string' ? { [this.primaryKey]: criteria } : criteria;
    const before = this.rows.length;
    this.rows = this.rows.filter((row) => !matches(row, where));
    return { affected: before - this.rows.length };
  }

  async remove(entity: T): Promise<T> {
    const key: unknown = Reflect.get(entity, this.primaryKey);
    this.rows = this.rows.filter((row) => !sameValue(Reflect.get(row, this.primaryKey), key));
    return entity;
  }

  restore(rows: T[]): void {
    this.rows = rows.map((row) => this.copy(row));
  }

  private indexOf(entity: T): number {
    const key: unknown = Reflect.get(entity, this.primaryKey);
    return this.rows.findIndex((row) => sameValue(Reflect.get(row, this.primaryKey), key));
  }

  private assertUnique(entity: T): void {
    const key: unknown = Reflect.get(entity, this.primaryKey);
    for (const constraint of this.options.unique ?? []) {
      const { columns, name } = Array.isArray(constraint) ? { columns: constraint, name: undefined } : constraint;
      const clash = this.rows.some(
        (row) =>
          !sameValue(Reflect.get(row, this.primaryKey), key) &&
          columns.every((column) => sameValue(Reflect.get(row, column), Reflect.get(entity, column))),
      );
      if (clash) {
        throw new UniqueViolationError(columns, name);
      }
    }
  }

  private copy(row: T): T {
    return Object.assign(this.factory(), row);
  }
}

/**
 * Minimal DataSource stand-in: `transaction` hands the callback a manager
 * whose repositories are the registered fakes, and restores every
 * registered repository when the callback rejects. Transactions run one
 * at a time, the order row locks would impose on conflicting writers.
 */
export class InMemoryDataSource {
  private readonly repositories = new Map<EntityTarget<object>, InMemoryRepository<object>>();
  private pending: Promise<void> = Promise.resolve();

  register<T extends object>(target: EntityTarget<T>, repository: InMemoryRepository<T>): this {
    this.repositories.set(target, repository);
    return this;
  }

  getRepository<T extends object>(target: EntityTarget<T>): InMemoryRepository<object> {
    const repository = this.repositories.get(target);
    if (!repository) {
      throw new Error('No in-memory repository registered for entity');
    }
    return repository;
  }

  transaction<R>(work: (manager: { getRepository: InMemoryDataSource['getRepository'] }) => Promise<R>): Promise<R> {
    const result = this.pending.then(() => this.runIsolated(work));
    this.pending = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async runIsolated<R>(
    work: (manager: { getRepository: InMemoryDataSource['getRepository'] }) => Promise<R>,
  ): Promise<R> {
    const snapshots = new Map<InMemoryRepository<object>, object[]>();
    for (const repository of this.repositories.values()) {
      snapshots.set(repository, repository.all);
    }

    try {
      return await work({ getRepository: (target) => this.getRepository(target) });
    } catch (error) {
      for (const [repository, rows] of snapshots) {
        repository.restore(rows);
      }
      throw error;
    }
  }
}
