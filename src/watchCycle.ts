import fs from "fs-extra";
import path from "path";
import {
  BookingRecord,
  CategoryOutcome,
  CycleSummary,
  ScrapeCategory,
  SearchType,
} from "./types";
import { RosterParser } from "./rosterParser";
import { WatchMatcher } from "./watchMatcher";
import { SeenStore, fingerprint } from "./seenStore";
import { ErrorEscalationPolicy } from "./escalationPolicy";
import { Notifier } from "./notifier";
import { formatAlert } from "./alertFormatter";
import { ScrapeError, errorMessage } from "./errors";
import { logger } from "./logger";

export const BOOKED_TODAY: ScrapeCategory = {
  seenKey: "booked",
  searchType: SearchType.BookedToday,
  label: "Booked Today",
  alert: "booking",
};

export const RELEASED_LAST_7_DAYS: ScrapeCategory = {
  seenKey: "released",
  searchType: SearchType.ReleasedLast7Days,
  label: "Released Last 7 Days",
  alert: "release",
};

export const DEFAULT_CATEGORIES: readonly ScrapeCategory[] = [BOOKED_TODAY, RELEASED_LAST_7_DAYS];

export interface RosterSource {
  search(searchType: SearchType): Promise<string>;
}

export interface WatchCycleDeps {
  source: RosterSource;
  parser: RosterParser;
  matcher: WatchMatcher;
  store: SeenStore;
  escalation: ErrorEscalationPolicy;
  notifier: Notifier;
  categories?: readonly ScrapeCategory[];
  /** When set, each category's raw response is written here as debug_<category>.html */
  debugDumpDir?: string;
}

export class WatchCycle {
  private readonly categories: readonly ScrapeCategory[];

  constructor(private readonly deps: WatchCycleDeps) {
    this.categories = deps.categories ?? DEFAULT_CATEGORIES;
  }

  async run(): Promise<CycleSummary> {
    logger.info("=".repeat(50));
    logger.info("Starting check cycle...");

    const outcomes: CategoryOutcome[] = [];
    for (const category of this.categories) {
      outcomes.push(await this.runCategory(category));
    }

    const success = outcomes.every((outcome) => outcome.success);
    if (success) {
      this.deps.escalation.reportSuccess();
    }

    const saved = await this.deps.store.save();

    logger.info("Check cycle complete");
    return { outcomes, success, saved };
  }

  async runCategory(category: ScrapeCategory): Promise<CategoryOutcome> {
    const { label } = category;
    logger.info(`Checking '${label}'...`);

    const outcome: CategoryOutcome = {
      category: category.seenKey,
      success: false,
      recordsFound: 0,
      matches: [],
    };

    try {
      const html = await this.deps.source.search(category.searchType);
      await this.dumpResponse(category, html);

      const extraction = this.deps.parser.parse(html);
      if (extraction.status === "no-table") {
        await this.deps.escalation.reportFailure(
          "No Results Table",
          `Could not find results table on '${label}' page - site may have changed or be blocking requests`
        );
        return outcome;
      }

      outcome.recordsFound = extraction.records.length;
      logger.info(`Found ${extraction.records.length} records in '${label}'`);

      for (const record of extraction.records) {
        if (await this.processRecord(category, record)) {
          outcome.matches.push(record);
        }
      }

      outcome.success = true;
      return outcome;
    } catch (error) {
      await this.reportError(category, error);
      return outcome;
    }
  }

  /** Returns true when the record produced a new alert. */
  private async processRecord(category: ScrapeCategory, record: BookingRecord): Promise<boolean> {
    const key = fingerprint(record);
    const name = `${record.lastName}, ${record.firstName}`;

    if (this.deps.store.hasSeen(category.seenKey, key)) {
      logger.debug(`Already seen ${category.alert} for ${name}`);
      return false;
    }

    const watchEntry = this.deps.matcher.findMatch(record.firstName, record.lastName);
    if (watchEntry === null) {
      return false;
    }

    logger.info(`Match for "${watchEntry}" in '${category.label}': ${name} (#${record.bookingNumber})`);
    await this.deps.notifier.send(formatAlert(category.alert, record));
    this.deps.store.markSeen(category.seenKey, key);
    return true;
  }

  private async reportError(category: ScrapeCategory, error: unknown): Promise<void> {
    const { label } = category;
    if (error instanceof ScrapeError) {
      const details = error.errorType.startsWith("HTTP Error")
        ? `Failed to fetch '${label}': ${error.message}`
        : `Failed to connect for '${label}': ${error.message}`;
      await this.deps.escalation.reportFailure(error.errorType, details);
      return;
    }

    logger.error(`Error processing '${label}'`, error);
    await this.deps.escalation.reportFailure(
      "Processing Error",
      `Error processing '${label}': ${errorMessage(error)}`
    );
  }

  private async dumpResponse(category: ScrapeCategory, html: string): Promise<void> {
    if (!this.deps.debugDumpDir) {
      return;
    }

    const file = path.join(this.deps.debugDumpDir, `debug_${category.seenKey}.html`);
    try {
      await fs.outputFile(file, html);
      logger.debug(`Saved response HTML to ${file}`);
    } catch (error) {
      logger.warn(`Could not save response HTML to ${file}: ${errorMessage(error)}`);
    }
  }
}
