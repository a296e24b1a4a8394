// Current position for a single ticker, in the reporting currency
export interface PositionDto {
  ticker: string;
  quantity: number;
  averageCost: number;             // running weighted average
  costBasis: number;               // quantity * averageCost
  marketPrice: number;
  priceDate: string;               // date of the close used
  marketValue: number;             // quantity * converted close
  unrealizedPnl: number;
  realizedPnl: number;
}

// Complete portfolio snapshot
export interface PortfolioResponseDto {
  asOf: string;
  currency: string;
  positions: PositionDto[];
  totalValue: number;              // sum of all position values
  totalCostBasis: number;
  totalUnrealizedPnl: number;      // sum of all unrealized PnL
}
