export type Direction = "YES" | "NO";

export type TradingMode = "backtest" | "paper" | "live";

export interface Article {
  headline: string;
  summary: string;
  source: string;
  url: string;
  publishedAt: Date;
  category?: string;
}

export interface MarketQuote {
  marketId: string;
  question: string;
  yesPrice: number;
  noPrice: number;
  volume24h: number;
  resolved: boolean;
  outcome: Direction | null;
  /** When the quote was observed; used for staleness checks. */
  fetchedAt: Date;
  endDate?: string;
}

/** Untrusted candidate produced by a strategy or extractor. */
export interface RawSignal {
  marketId: string;
  direction: Direction;
  estimatedProb: number;
  confidence: number;
  reasoning: string;
  headline?: string;
}

export interface Signal {
  timestamp: Date;
  marketId: string;
  question: string;
  direction: Direction;
  quotedPrice: number;
  effectivePrice: number;
  estimatedProb: number;
  /** Fee and slippage adjusted expected value per dollar staked. */
  edge: number;
  confidence: number;
  reasoning: string;
  headline: string;
}

export interface Bet {
  readonly id: string;
  readonly signal: Signal;
  readonly stakeAmount: number;
  readonly kellyFractionApplied: number;
  readonly mode: TradingMode;
  readonly executionPrice: number;
  readonly shares: number;
  readonly placedAt: Date;
}

export type PositionStatus = "open" | "resolved";

export interface Position {
  marketId: string;
  direction: Direction;
  shares: number;
  avgPrice: number;
  costBasis: number;
  status: PositionStatus;
  openedAt: Date;
  betIds: string[];
  outcome?: Direction;
  payout?: number;
  realizedPnl?: number;
  resolvedAt?: Date;
}

export interface Resolution {
  marketId: string;
  outcome: Direction;
  resolvedAt: Date;
}

export interface BetResult {
  betId: string;
  marketId: string;
  direction: Direction;
  stake: number;
  shares: number;
  executionPrice: number;
  outcome: Direction;
  won: boolean;
  pnl: number;
  edgeAtEntry: number;
  resolvedAt: Date;
}

export interface RiskState {
  /** UTC day (YYYY-MM-DD) the daily figures refer to. */
  date: string;
  dailyPnl: number;
  startOfDayBankroll: number;
  openPositionCount: number;
  bankroll: number;
}

export interface EquitySample {
  date: string;
  bankroll: number;
}

export interface PerformanceMetrics {
  totalPnl: number;
  numBets: number;
  wins: number;
  losses: number;
  winRate: number;
  avgEdge: number;
  sharpeRatio: number;
  maxDrawdown: number;
}

/**
 * A signal generator. Strategies are held in a list by the loop and the
 * backtest runner; nothing else about them is assumed.
 */
export interface Strategy {
  readonly name: string;
  generateSignals(articles: Article[], markets: MarketQuote[]): Promise<RawSignal[]>;
}

export interface NewsSource {
  /** Returns only articles not returned by a previous call. */
  fetchNewArticles(): Promise<Article[]>;
}

export interface MarketDataSource {
  readonly name: string;
  fetchMarkets(): Promise<MarketQuote[]>;
  fetchResolutions(marketIds: string[]): Promise<Resolution[]>;
}

export interface SignalExtractor {
  extract(article: Article, candidates: MarketQuote[]): Promise<RawSignal[]>;
}

export type AgentState = "idle" | "sensing" | "thinking" | "acting" | "tracking" | "sleeping";

export interface AgentStatus {
  state: AgentState;
  running: boolean;
  suspended: boolean;
  suspendReason: string | null;
  mode: TradingMode;
  bankroll: number;
  openPositions: Position[];
  todayPnl: number;
  lastTickAt: string | null;
  lastError: string | null;
  ticksCompleted: number;
  ticksFailed: number;
  ticksSkipped: number;
}
