export class RepositoryRequestError extends Error {
  status: number | null;
  url: string;

  constructor(url: string, message: string, status: number | null = null) {
    const statusLabel = status === null ? "" : ` (HTTP ${status})`;
    super(`Repository request to ${url} failed${statusLabel}: ${message}`);
    this.name = "RepositoryRequestError";
    this.status = status;
    this.url = url;
  }
}

export class RepositoryConnectionError extends Error {
  constructor(baseUrl: string) {
    super(`Cannot connect to repository service at ${baseUrl}.`);
    this.name = "RepositoryConnectionError";
  }
}
