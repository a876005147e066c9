import { Agent, Dispatcher, fetch } from "undici";
import { SearchType } from "./types";
import { ScrapeError, errorMessage } from "./errors";
import { logger } from "./logger";

export interface RosterClientOptions {
  searchUrl: string;
  userAgent: string;
  requestTimeoutMs: number;
  dispatcher?: Dispatcher;
}

/**
 * The roster site negotiates weak DH parameters and serves an incomplete
 * certificate chain, both of which current OpenSSL defaults reject.
 */
export function createLegacyTlsAgent(): Agent {
  return new Agent({
    connect: {
      rejectUnauthorized: false,
      ciphers: "DEFAULT:@SECLEVEL=1",
    },
  });
}

export class RosterClient {
  private readonly dispatcher: Dispatcher;

  constructor(private readonly options: RosterClientOptions) {
    this.dispatcher = options.dispatcher ?? createLegacyTlsAgent();
  }

  /**
   * Submits the search form for one result list and returns the response
   * body untouched. Throws ScrapeError on HTTP or transport failure.
   */
  async search(searchType: SearchType): Promise<string> {
    const form = new URLSearchParams({
      FirstName: "",
      LastName: "",
      SearchType: searchType,
    });

    logger.debug(`Submitting search: SearchType=${searchType}`);

    let status: number;
    let statusText: string;
    let body: string;
    try {
      const response = await fetch(this.options.searchUrl, {
        method: "POST",
        headers: {
          "content-type": "application/x-www-form-urlencoded",
          "user-agent": this.options.userAgent,
        },
        body: form.toString(),
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
        dispatcher: this.dispatcher,
      });
      status = response.status;
      statusText = response.statusText;
      body = await response.text();
    } catch (error) {
      if (isTimeout(error)) {
        throw new ScrapeError(
          "Timeout",
          `request timed out after ${this.options.requestTimeoutMs}ms`,
          { cause: error }
        );
      }
      throw new ScrapeError("Connection Error", describeTransportError(error), { cause: error });
    }

    logger.debug(`Response status: ${status}, length: ${body.length}`);

    if (status >= 400) {
      throw new ScrapeError(
        `HTTP Error ${status}`,
        `${[status, statusText].filter(Boolean).join(" ")} for url: ${this.options.searchUrl}`
      );
    }

    return body;
  }

  async close(): Promise<void> {
    if (!this.options.dispatcher) {
      await this.dispatcher.close();
    }
  }
}

function isTimeout(error: unknown): boolean {
  return typeof error === "object" && error !== null && "name" in error && error.name === "TimeoutError";
}

/** undici reports "fetch failed" and keeps the socket-level reason in `cause`. */
function describeTransportError(error: unknown): string {
  const message = errorMessage(error);
  if (error instanceof Error && error.cause !== undefined) {
    return `${message}: ${errorMessage(error.cause)}`;
  }
  return message;
}
