export interface WeightDto {
  ticker: string;
  marketValue: number;
  weight: number;                  // share of total market value, 0..1
}

export interface PortfolioWeightsResponseDto {
  asOf: string;
  currency: string;
  totalValue: number;
  weights: WeightDto[];
}

export interface WeightsRowDto {
  date: string;
  totalValue: number;
  weights: WeightDto[];            // held tickers only
}

export interface PortfolioWeightsHistoryResponseDto {
  currency: string;
  from: string | null;             // null when the ledger is empty
  to: string | null;
  tickers: string[];
  rows: WeightsRowDto[];
}
