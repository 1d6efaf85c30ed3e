/** Port for fetching a remote resource. Rejects with `FetchError` on any failure. */
export interface HttpClient {
  get(url: string): Promise<Buffer>;
}
