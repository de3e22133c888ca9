/**
 * Lazily created AWS SDK clients, one per region
 */
export class RegionalClientPool<TClient> {
  private readonly clients = new Map<string, TClient>();
  private readonly create: (region: string) => TClient;

  constructor(create: (region: string) => TClient) {
    this.create = create;
  }

  get(region: string): TClient {
    let client = this.clients.get(region);
    if (!client) {
      client = this.create(region);
      this.clients.set(region, client);
    }
    return client;
  }
}
