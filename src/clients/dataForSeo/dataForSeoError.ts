/**
 * DataForSeoError: provider response that is not usable (not an HTTP failure)
 */

export class DataForSeoError extends Error {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(`${message} - ${url}`);
    this.name = "DataForSeoError";
    this.url = url;
  }
}
