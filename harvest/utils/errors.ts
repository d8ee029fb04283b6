
/** A source page could not be reached or answered with a non-2xx status. */
export class FetchError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, status: number | null = null) {
    super(`GET ${url} -> ${message}`);
    this.name = "FetchError";
    this.url = url;
    this.status = status;
  }
}

/** A results page did not have the table structure its layout describes. */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class MappingError extends Error {
  readonly country: string;

  constructor(country: string) {
    super(`No ISO3 code for '${country}'`);
    this.name = "MappingError";
    this.country = country;
  }
}
