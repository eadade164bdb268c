// src/utils/portfolioMapper.ts
import { IHolding, IPortfolio } from '../models/portfolio.model';
import { HoldingDTO, HoldingPositionDTO, PortfolioDTO, PortfolioSummaryDTO } from '../types/portfolio-dtos';

export function toHoldingDTO(holding: IHolding): HoldingDTO {
  return {
    name_of_instrument: holding.nameOfInstrument,
    isin_code: holding.isinCode,
    percentage_to_nav: holding.percentageToNav,
    ...(holding.marketValue !== undefined ? { market_value: holding.marketValue } : {}),
    ...(holding.quantity !== undefined ? { quantity: holding.quantity } : {}),
  };
}

export function toPortfolioSummaryDTO(portfolio: IPortfolio): PortfolioSummaryDTO {
  return {
    portfolio_id: portfolio._id,
    mutual_fund_name: portfolio.mutualFundName,
    portfolio_date: portfolio.portfolioDate,
    total_holdings: portfolio.totalHoldings,
    source_file_id: portfolio.sourceFileId,
    parse_method: portfolio.parseMethod,
  };
}

export function toPortfolioDTO(portfolio: IPortfolio): PortfolioDTO {
  return {
    ...toPortfolioSummaryDTO(portfolio),
    sheet_id: portfolio.sheetId,
    holdings: portfolio.holdings.map(toHoldingDTO),
    updated_at: portfolio.updatedAt ? portfolio.updatedAt.toISOString() : null,
  };
}

/** Every holding of `isinCode` across the given portfolios. */
export function toHoldingPositions(portfolios: IPortfolio[], isinCode: string): HoldingPositionDTO[] {
  return portfolios.flatMap(portfolio =>
    portfolio.holdings
      .filter(holding => holding.isinCode === isinCode)
      .map(holding => ({
        portfolio_id: portfolio._id,
        mutual_fund_name: portfolio.mutualFundName,
        portfolio_date: portfolio.portfolioDate,
        name_of_instrument: holding.nameOfInstrument,
        percentage_to_nav: holding.percentageToNav,
      }))
  );
}
