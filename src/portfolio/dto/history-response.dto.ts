export interface HoldingBreakdownDto {
  ticker: string;
  quantity: number;
  price: number;
  marketValue: number;
}

export interface PortfolioHistoryPointDto {
  date: string;
  totalValue: number;
  netInvested: number;
  totalPnl: number;                // realizedPnl + unrealizedPnl
  realizedPnl: number;
  unrealizedPnl: number;
  breakdown: HoldingBreakdownDto[];
}

export interface PortfolioHistoryResponseDto {
  currency: string;
  from: string | null;             // null when the ledger is empty
  to: string | null;
  history: PortfolioHistoryPointDto[];
  computedAt?: string;             // set on stored snapshots
}
