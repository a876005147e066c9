/** Upstream search form codes. */
export const SearchType = {
  NowInCustody: "0",
  ReleasedLast7Days: "1",
  EmergencyReleases: "2",
  BookedLast7Days: "3",
  BookedToday: "4",
  BookedYesterday: "5",
} as const;

export type SearchType = (typeof SearchType)[keyof typeof SearchType];

export type SeenCategory = "booked" | "released";

export type AlertKind = "booking" | "release";

export interface BookingRecord {
  lastName: string;
  firstName: string;
  date: string; // As displayed by the roster, e.g. "01/02/2024 10:15 PM"
  bookingNumber: string; // Trailing segment of the name link, "" when absent
  fullNameDisplay: string; // Raw "Last, First" text
}

export type ExtractionResult =
  | { status: "table"; records: BookingRecord[] }
  | { status: "no-table" };

export interface ScrapeCategory {
  seenKey: SeenCategory;
  searchType: SearchType;
  label: string;
  alert: AlertKind;
}

export interface PersistedSeenBookings {
  booked: string[];
  released: string[];
}

export interface FailureState {
  consecutiveFailures: number;
  lastEscalationTime: Date | null;
}

export interface CategoryOutcome {
  category: SeenCategory;
  success: boolean;
  recordsFound: number;
  matches: BookingRecord[];
}

export interface CycleSummary {
  outcomes: CategoryOutcome[];
  success: boolean;
  saved: boolean;
}
