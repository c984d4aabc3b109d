import { AppError, InvalidTransitionError, NotFoundError } from "../../errors/AppError";
import { KeyedLock } from "../../utils/keyedLock";
import { assertStageTransition, isTerminalStage } from "./applicationStage";
import type { ApplicationRecord } from "./application.types";

export type RecordUpdate = (current: Readonly<ApplicationRecord>) => ApplicationRecord;

/**
 * Keyed collection of application records. Reads return frozen snapshots;
 * updates for one id are serialized and replace the whole record at once.
 */
export interface ApplicationStore {
  insert(record: ApplicationRecord): Promise<void>;
  get(id: string): Promise<ApplicationRecord | null>;
  list(): Promise<ApplicationRecord[]>;
  update(id: string, mutate: RecordUpdate): Promise<ApplicationRecord>;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return value;
}

function snapshot(record: ApplicationRecord): ApplicationRecord {
  return deepFreeze(structuredClone(record));
}

function assertConsistentUpdate(current: ApplicationRecord, next: ApplicationRecord): void {
  if (next.id !== current.id) {
    throw new AppError("invalid_update", "Application id cannot change.", 500);
  }
  if (isTerminalStage(current.currentStage)) {
    throw new InvalidTransitionError("Application is in a terminal stage.", {
      id: current.id,
      current: current.currentStage,
    });
  }
  if (next.currentStage !== current.currentStage) {
    assertStageTransition(current.currentStage, next.currentStage);
  }
  if (next.events.length < current.events.length || next.history.length < current.history.length) {
    throw new AppError("invalid_update", "Event log is append-only.", 500);
  }
}

export class InMemoryApplicationStore implements ApplicationStore {
  private readonly records = new Map<string, ApplicationRecord>();
  private readonly lock = new KeyedLock();

  async insert(record: ApplicationRecord): Promise<void> {
    await this.lock.runExclusive(record.id, () => {
      if (this.records.has(record.id)) {
        throw new AppError("duplicate_application", "Application already exists.", 409);
      }
      this.records.set(record.id, snapshot(record));
    });
  }

  async get(id: string): Promise<ApplicationRecord | null> {
    return this.records.get(id) ?? null;
  }

  async list(): Promise<ApplicationRecord[]> {
    return Array.from(this.records.values()).sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async update(id: string, mutate: RecordUpdate): Promise<ApplicationRecord> {
    return this.lock.runExclusive(id, () => {
      const current = this.records.get(id);
      if (!current) {
        throw new NotFoundError("Application", id);
      }
      const next = mutate(current);
      assertConsistentUpdate(current, next);
      const stored = snapshot(next);
      this.records.set(id, stored);
      return stored;
    });
  }

  size(): number {
    return this.records.size;
  }
}
