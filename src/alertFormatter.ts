import { AlertKind, BookingRecord } from "./types";

function displayName(record: BookingRecord): string {
  return record.firstName ? `${record.lastName}, ${record.firstName}` : record.lastName;
}

export function formatBookingAlert(record: BookingRecord): string {
  const lines = ["🚨 *BOOKING ALERT*", `*Name:* ${displayName(record)}`];
  if (record.date) {
    lines.push(`*Booking Date:* ${record.date}`);
  }
  if (record.bookingNumber) {
    lines.push(`*Booking #:* ${record.bookingNumber}`);
  }
  return lines.join("\n");
}

export function formatReleaseAlert(record: BookingRecord): string {
  const lines = ["✅ *RELEASE ALERT*", `*Name:* ${displayName(record)}`];
  // The released list shows the booking date, not the release date
  if (record.date) {
    lines.push(`*Original Booking Date:* ${record.date}`);
  }
  if (record.bookingNumber) {
    lines.push(`*Booking #:* ${record.bookingNumber}`);
  }
  return lines.join("\n");
}

export function formatAlert(kind: AlertKind, record: BookingRecord): string {
  return kind === "booking" ? formatBookingAlert(record) : formatReleaseAlert(record);
}

export function formatEscalation(
  errorType: string,
  details: string,
  failureCount: number,
  intervalHours: number
): string {
  return [
    "⚠️ *SCRAPER ERROR*",
    `*Error Type:* ${errorType}`,
    `*Details:* ${details}`,
    `*Failure Count:* ${failureCount} since last success`,
    `_Next error report in ${intervalHours} hours if errors persist_`,
  ].join("\n");
}
