// Realized gains/losses, closed tickers included
export interface RealizedPnlDto {
  ticker: string;
  realizedPnl: number;             // sells + dividends - fees
  grossInvested: number;
  grossWithdrawn: number;          // sale proceeds
}

// Unrealized gains/losses from open positions
export interface UnrealizedPnlDto {
  ticker: string;
  unrealizedPnl: number;           // paper profit/loss
  currentQuantity: number;         // still holding
  averageCost: number;
  marketPrice: number;
}

// Complete PnL breakdown
export interface PnlResponseDto {
  asOf: string;
  currency: string;
  realizedPnl: RealizedPnlDto[];
  unrealizedPnl: UnrealizedPnlDto[];
  totalRealizedPnl: number;
  totalUnrealizedPnl: number;
  netPnl: number;                  // realized + unrealized
}
