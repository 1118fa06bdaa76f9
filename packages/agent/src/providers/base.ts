import type { MarketDataSource, MarketQuote, Resolution } from "../types.js";

export abstract class MarketProvider implements MarketDataSource {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  abstract fetchMarkets(): Promise<MarketQuote[]>;

  abstract fetchResolutions(marketIds: string[]): Promise<Resolution[]>;
}
