import * as cheerio from "cheerio";
import { BookingRecord, ExtractionResult } from "./types";
import { logger } from "./logger";

const RESULTS_TABLE_SELECTOR = "table.search-results";

function clean(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Splits "Last, First" on the first comma. Without a comma the whole
 * string is the last name.
 */
export function splitDisplayName(fullName: string): { lastName: string; firstName: string } {
  const commaAt = fullName.indexOf(",");
  if (commaAt === -1) {
    return { lastName: fullName.trim(), firstName: "" };
  }
  return {
    lastName: fullName.slice(0, commaAt).trim(),
    firstName: fullName.slice(commaAt + 1).trim(),
  };
}

/**
 * Booking number is the last path segment of the name link,
 * e.g. /PAID/Home/Booking/1638002 -> "1638002".
 */
export function bookingNumberFromHref(href: string | undefined): string {
  if (!href) {
    return "";
  }
  return href.split("/").pop() ?? "";
}

/** Builds a record from a row's name text, date text and optional name link. */
export function toRecord(
  nameText: string,
  dateText: string,
  href: string | undefined
): BookingRecord | null {
  const fullName = clean(nameText);
  const { lastName, firstName } = splitDisplayName(fullName);
  if (!lastName) {
    return null;
  }

  return {
    lastName,
    firstName,
    date: dateText.trim(),
    bookingNumber: href === undefined ? "" : bookingNumberFromHref(href),
    fullNameDisplay: fullName,
  };
}

export class RosterParser {
  parse(html: string): ExtractionResult {
    // htmlparser2 does not insert implied <tbody> elements
    const $ = cheerio.load(html, { xml: { xmlMode: false } });

    let table = $(RESULTS_TABLE_SELECTOR).first();
    if (table.length === 0) {
      table = $("table").first();
    }

    if (table.length === 0) {
      logger.debug("No table found on page!");
      return { status: "no-table" };
    }

    logger.debug(`Found table with class=${table.attr("class") ?? "(none)"}`);

    const tbody = table.children("tbody").first();
    // Without an explicit body the first row is the header
    const rows = tbody.length > 0 ? tbody.find("tr") : table.find("tr").slice(1);

    logger.debug(`Found ${rows.length} data rows`);

    const records: BookingRecord[] = [];
    rows.each((_, row) => {
      const cells = $(row).children("td");
      if (cells.length < 2) {
        return;
      }

      const nameCell = cells.eq(0);
      const nameLink = nameCell.find("a").first();
      const record =
        nameLink.length > 0
          ? toRecord(nameLink.text(), cells.eq(1).text(), nameLink.attr("href"))
          : toRecord(nameCell.text(), cells.eq(1).text(), undefined);

      if (record) {
        records.push(record);
        logger.debug(
          `  Found: ${record.lastName}, ${record.firstName} (#${record.bookingNumber}) - ${record.date}`
        );
      }
    });

    if (records.length === 0) {
      logger.debug("No records found in table");
    }

    return { status: "table", records };
  }
}
