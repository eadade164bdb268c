// Wire shapes for the /portfolios API (snake_case contract)
import { ParseMethod } from '../config/env';

export interface HoldingDTO {
  name_of_instrument: string;
  isin_code: string;
  percentage_to_nav: string;
  market_value?: number;
  quantity?: number;
}

export interface PortfolioSummaryDTO {
  portfolio_id: string;
  mutual_fund_name: string;
  portfolio_date: string;
  total_holdings: number;
  source_file_id: string;
  parse_method: ParseMethod;
}

export interface PortfolioDTO extends PortfolioSummaryDTO {
  sheet_id: string;
  holdings: HoldingDTO[];
  updated_at: string | null;
}

/** One fund's position in a given instrument. */
export interface HoldingPositionDTO {
  portfolio_id: string;
  mutual_fund_name: string;
  portfolio_date: string;
  name_of_instrument: string;
  percentage_to_nav: string;
}
