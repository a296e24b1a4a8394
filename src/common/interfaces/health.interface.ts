export interface HealthResponse {
  status: 'ok' | 'error';
  timestamp: string;
  uptime: number;
  service: string;
  transactions: number;            // ledger size
  pricedTickers: number;           // tickers with at least one close
  marketDataUpdatedAt: string;
}
