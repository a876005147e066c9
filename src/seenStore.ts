import fs from "fs-extra";
import path from "path";
import { z } from "zod";
import { BookingRecord, PersistedSeenBookings, SeenCategory } from "./types";
import { logger } from "./logger";
import { errorMessage } from "./errors";

const FINGERPRINT_SEPARATOR = "|";

const persistedSchema = z.object({
  booked: z.array(z.string()).default([]),
  released: z.array(z.string()).default([]),
});

type FingerprintFields = Pick<BookingRecord, "lastName" | "firstName" | "date" | "bookingNumber">;

/**
 * Identity of a booking or release event across scrapes. Empty fields are
 * left out, so a record without a booking number still gets a stable key.
 */
export function fingerprint(record: FingerprintFields): string {
  return [record.lastName, record.firstName, record.date, record.bookingNumber]
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(FINGERPRINT_SEPARATOR);
}

/** Insertion-ordered set, so the file keeps the order entries were seen in. */
class SeenList {
  private readonly index = new Set<string>();

  has(key: string): boolean {
    return this.index.has(key);
  }

  add(key: string): boolean {
    if (this.index.has(key)) {
      return false;
    }
    this.index.add(key);
    return true;
  }

  get size(): number {
    return this.index.size;
  }

  toArray(): string[] {
    return Array.from(this.index);
  }
}

export class SeenStore {
  private seen: Record<SeenCategory, SeenList> = {
    booked: new SeenList(),
    released: new SeenList(),
  };

  constructor(private readonly storagePath: string) {}

  hasSeen(category: SeenCategory, key: string): boolean {
    return this.seen[category].has(key);
  }

  /** Returns false when the key was already recorded. */
  markSeen(category: SeenCategory, key: string): boolean {
    return this.seen[category].add(key);
  }

  count(category: SeenCategory): number {
    return this.seen[category].size;
  }

  snapshot(): PersistedSeenBookings {
    return {
      booked: this.seen.booked.toArray(),
      released: this.seen.released.toArray(),
    };
  }

  /** Replaces in-memory state with the file's. Never throws. */
  async load(): Promise<void> {
    this.seen = { booked: new SeenList(), released: new SeenList() };

    try {
      if (!(await fs.pathExists(this.storagePath))) {
        logger.info(`No seen bookings file at ${this.storagePath}, starting fresh`);
        return;
      }

      const raw: unknown = await fs.readJSON(this.storagePath);
      const parsed = persistedSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn(
          `Could not load seen bookings: ${this.storagePath} has an unexpected shape, starting fresh`
        );
        return;
      }

      parsed.data.booked.forEach((key) => this.seen.booked.add(key));
      parsed.data.released.forEach((key) => this.seen.released.add(key));
      logger.info(
        `Loaded ${this.seen.booked.size} booked and ${this.seen.released.size} released records`
      );
    } catch (error) {
      logger.warn(`Could not load seen bookings: ${errorMessage(error)}`);
    }
  }

  /** Rewrites the whole file. Returns false, after logging, when the write fails. */
  async save(): Promise<boolean> {
    const data = this.snapshot();
    try {
      await fs.ensureDir(path.dirname(this.storagePath));
      await fs.writeJSON(this.storagePath, data, { spaces: 2 });
      logger.info(`Saved ${data.booked.length} booked and ${data.released.length} released records`);
      return true;
    } catch (error) {
      logger.error(`Error saving seen bookings to ${this.storagePath}: ${errorMessage(error)}`, error);
      return false;
    }
  }
}
