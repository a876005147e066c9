import fs from "fs-extra";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  BOOKED_TODAY,
  RELEASED_LAST_7_DAYS,
  RosterSource,
  WatchCycle,
} from "../src/watchCycle";
import { RosterParser } from "../src/rosterParser";
import { WatchMatcher } from "../src/watchMatcher";
import { SeenStore } from "../src/seenStore";
import { ErrorEscalationPolicy } from "../src/escalationPolicy";
import { Notifier } from "../src/notifier";
import { ScrapeError } from "../src/errors";
import { SearchType } from "../src/types";

function resultsPage(rows: Array<[name: string, date: string, href?: string]>): string {
  const body = rows
    .map(([name, date, href]) => {
      const nameCell = href ? `<a href="${href}">${name}</a>` : name;
      return `<tr><td>${nameCell}</td><td>${date}</td></tr>`;
    })
    .join("\n");
  return `<table class="search-results"><thead><tr><th>Name</th><th>Date</th></tr></thead><tbody>${body}</tbody></table>`;
}

const NO_TABLE_PAGE = "<html><body><h1>Request blocked</h1></body></html>";

type Responder = (searchType: SearchType) => Promise<string>;

class FakeSource implements RosterSource {
  readonly calls: SearchType[] = [];

  constructor(private responder: Responder) {}

  respondWith(responder: Responder): void {
    this.responder = responder;
  }

  search(searchType: SearchType): Promise<string> {
    this.calls.push(searchType);
    return this.responder(searchType);
  }
}

function pages(booked: string, released: string): Responder {
  return async (searchType) => (searchType === SearchType.BookedToday ? booked : released);
}

describe("WatchCycle", () => {
  let dir: string;
  let storagePath: string;
  let sent: string[];
  let notifier: Notifier;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "watch-cycle-"));
    storagePath = path.join(dir, "seen_bookings.json");
    sent = [];
    notifier = {
      name: "memory",
      send: async (text: string) => {
        sent.push(text);
        return true;
      },
    };
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  function createCycle(source: RosterSource, watchNames: string[], store = new SeenStore(storagePath)) {
    const escalation = new ErrorEscalationPolicy(notifier);
    const cycle = new WatchCycle({
      source,
      parser: new RosterParser(),
      matcher: new WatchMatcher(watchNames),
      store,
      escalation,
      notifier,
    });
    return { cycle, escalation, store };
  }

  it("alerts once per new matching record and persists its fingerprint", async () => {
    const source = new FakeSource(
      pages(
        resultsPage([
          ["Doe, John", "01/02/2024", "/PAID/Home/Booking/123"],
          ["Smith, Anna", "01/02/2024", "/PAID/Home/Booking/124"],
        ]),
        resultsPage([])
      )
    );
    const { cycle } = createCycle(source, ["Doe"]);

    const summary = await cycle.run();

    expect(source.calls).toEqual([SearchType.BookedToday, SearchType.ReleasedLast7Days]);
    expect(summary.success).toBe(true);
    expect(summary.saved).toBe(true);
    expect(summary.outcomes.map((o) => [o.category, o.recordsFound, o.matches.length])).toEqual([
      ["booked", 2, 1],
      ["released", 0, 0],
    ]);
    expect(sent).toEqual([
      "🚨 *BOOKING ALERT*\n*Name:* Doe, John\n*Booking Date:* 01/02/2024\n*Booking #:* 123",
    ]);
    expect(await fs.readJSON(storagePath)).toEqual({
      booked: ["Doe|John|01/02/2024|123"],
      released: [],
    });
  });

  it("does not alert again for a record seen in an earlier cycle", async () => {
    const page = resultsPage([["Doe, John", "01/02/2024", "/x/123"]]);
    const source = new FakeSource(pages(page, resultsPage([])));
    const { cycle } = createCycle(source, ["Doe John"]);

    await cycle.run();
    await cycle.run();

    expect(sent).toHaveLength(1);
  });

  it("remembers alerts across restarts through the data file", async () => {
    const page = resultsPage([["Roe, Jane", "01/03/2024", "/x/77"]]);

    const first = createCycle(new FakeSource(pages(resultsPage([]), page)), ["Roe"]);
    await first.cycle.run();

    const reloaded = new SeenStore(storagePath);
    await reloaded.load();
    const second = createCycle(new FakeSource(pages(resultsPage([]), page)), ["Roe"], reloaded);
    await second.cycle.run();

    expect(sent).toEqual([
      "✅ *RELEASE ALERT*\n*Name:* Roe, Jane\n*Original Booking Date:* 01/03/2024\n*Booking #:* 77",
    ]);
  });

  it("tracks booked and released events separately", async () => {
    const page = resultsPage([["Doe, John", "01/02/2024", "/x/123"]]);
    const { cycle, store } = createCycle(new FakeSource(pages(page, page)), ["Doe"]);

    await cycle.run();

    expect(sent).toHaveLength(2);
    expect(store.snapshot()).toEqual({
      booked: ["Doe|John|01/02/2024|123"],
      released: ["Doe|John|01/02/2024|123"],
    });
  });

  it("escalates a page without a results table and still runs the other category", async () => {
    const source = new FakeSource(
      pages(NO_TABLE_PAGE, resultsPage([["Roe, Jane", "01/03/2024", "/x/77"]]))
    );
    const { cycle, escalation } = createCycle(source, ["Roe"]);

    const summary = await cycle.run();

    expect(summary.success).toBe(false);
    expect(summary.outcomes.map((o) => o.success)).toEqual([false, true]);
    expect(escalation.state.consecutiveFailures).toBe(1);
    expect(sent).toHaveLength(2);
    expect(sent[0]).toContain("*Error Type:* No Results Table");
    expect(sent[0]).toContain(
      "*Details:* Could not find results table on 'Booked Today' page - site may have changed or be blocking requests"
    );
    expect(sent[1]).toContain("RELEASE ALERT");
    expect(await fs.readJSON(storagePath)).toEqual({
      booked: [],
      released: ["Roe|Jane|01/03/2024|77"],
    });
  });

  it("maps upstream errors to escalation kinds", async () => {
    const source = new FakeSource(async (searchType) => {
      if (searchType === SearchType.BookedToday) {
        throw new ScrapeError("HTTP Error 503", "503 Service Unavailable for url: https://roster.test/search");
      }
      throw new ScrapeError("Connection Error", "fetch failed: connect ECONNREFUSED");
    });
    const { cycle, escalation } = createCycle(source, ["Doe"]);

    await cycle.run();

    // Only the first failure escalates inside the cooldown
    expect(sent).toEqual([
      [
        "⚠️ *SCRAPER ERROR*",
        "*Error Type:* HTTP Error 503",
        "*Details:* Failed to fetch 'Booked Today': 503 Service Unavailable for url: https://roster.test/search",
        "*Failure Count:* 1 since last success",
        "_Next error report in 4 hours if errors persist_",
      ].join("\n"),
    ]);
    expect(escalation.state.consecutiveFailures).toBe(2);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining(
        "Scraping error (Connection Error): Failed to connect for 'Released Last 7 Days': fetch failed: connect ECONNREFUSED [failure #2]"
      )
    );
  });

  it("reports unexpected errors as processing errors", async () => {
    const source = new FakeSource(async () => {
      throw new TypeError("boom");
    });
    const { cycle } = createCycle(source, ["Doe"]);

    await cycle.runCategory(RELEASED_LAST_7_DAYS);

    expect(sent[0]).toContain("*Error Type:* Processing Error");
    expect(sent[0]).toContain("*Details:* Error processing 'Released Last 7 Days': boom");
  });

  it("resets the failure count after a fully successful cycle", async () => {
    const source = new FakeSource(pages(NO_TABLE_PAGE, resultsPage([])));
    const { cycle, escalation } = createCycle(source, ["Doe"]);

    await cycle.run();
    expect(escalation.state.consecutiveFailures).toBe(1);

    source.respondWith(pages(resultsPage([]), resultsPage([])));
    await cycle.run();

    expect(escalation.state.consecutiveFailures).toBe(0);
    const recoveryLines = vi
      .mocked(console.log)
      .mock.calls.filter(([line]) => String(line).includes("Scraping recovered after 1 failures"));
    expect(recoveryLines).toHaveLength(1);
  });

  it("writes the raw response beside the data file in debug mode", async () => {
    const page = resultsPage([]);
    const cycle = new WatchCycle({
      source: new FakeSource(pages(page, page)),
      parser: new RosterParser(),
      matcher: new WatchMatcher(["Doe"]),
      store: new SeenStore(storagePath),
      escalation: new ErrorEscalationPolicy(notifier),
      notifier,
      categories: [BOOKED_TODAY],
      debugDumpDir: dir,
    });

    await cycle.run();

    expect(await fs.readFile(path.join(dir, "debug_booked.html"), "utf8")).toBe(page);
    expect(await fs.pathExists(path.join(dir, "debug_released.html"))).toBe(false);
  });
});
