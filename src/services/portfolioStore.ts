// src/services/portfolioStore.ts
import { FilterQuery } from 'mongoose';
import { IPortfolio, PortfolioModel } from '../models/portfolio.model';

export interface PortfolioListFilter {
  /** Case-insensitive substring of the fund name. */
  fundName?: string;
  sourceFileId?: string;
  /** Only portfolios holding this instrument. */
  isinCode?: string;
  limit?: number;
}

export interface IPortfolioStore {
  /** Inserts or replaces the portfolio keyed by `_id`. Returns the id. */
  upsert(portfolio: IPortfolio): Promise<string>;
  findById(portfolioId: string): Promise<IPortfolio | null>;
  /** Ordered by fund name, then id. */
  list(filter: PortfolioListFilter): Promise<IPortfolio[]>;
}

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export class MongoPortfolioStore implements IPortfolioStore {

  public async upsert(portfolio: IPortfolio): Promise<string> {
    const { _id, ...fields } = portfolio;
    await PortfolioModel.updateOne({ _id }, { $set: fields }, { upsert: true });
    return _id;
  }

  public async findById(portfolioId: string): Promise<IPortfolio | null> {
    const doc = await PortfolioModel.findById(portfolioId).lean<IPortfolio>();
    return doc ?? null;
  }

  public async list(filter: PortfolioListFilter): Promise<IPortfolio[]> {
    const query: FilterQuery<IPortfolio> = {};
    if (filter.fundName) query.mutualFundName = { $regex: escapeRegExp(filter.fundName), $options: 'i' };
    if (filter.sourceFileId) query.sourceFileId = filter.sourceFileId;
    if (filter.isinCode) query['holdings.isinCode'] = filter.isinCode;

    let cursor = PortfolioModel.find(query).sort({ mutualFundName: 1, _id: 1 });
    if (filter.limit) cursor = cursor.limit(filter.limit);

    const docs = await cursor.lean<IPortfolio[]>();
    return docs;
  }
}
