import { Schema, model } from 'mongoose';
import { ParseMethod } from '../config/env';

export interface IHolding {
  nameOfInstrument: string;
  isinCode: string;
  percentageToNav: string; // e.g. "2.4500%"
  marketValue?: number;
  quantity?: number;
}

/** Holdings extracted from one sheet, before persistence. */
export interface IPortfolioData {
  mutualFundName: string;
  portfolioDate: string; // As printed in the disclosure, e.g. "March 2025"
  totalHoldings: number;
  holdings: IHolding[];
}

export interface IPortfolio extends IPortfolioData {
  _id: string; // Same as sheetId so re-processing a sheet overwrites it
  sheetId: string;
  sourceFileId: string;
  parseMethod: ParseMethod;
  createdAt?: Date;
  updatedAt?: Date;
}

const HoldingSchema = new Schema<IHolding>(
  {
    nameOfInstrument: { type: String, required: true },
    isinCode: { type: String, required: true },
    percentageToNav: { type: String, required: true },
    marketValue: { type: Number },
    quantity: { type: Number },
  },
  { _id: false }
);

const PortfolioSchema = new Schema<IPortfolio>(
  {
    _id: { type: String, required: true },
    sheetId: { type: String, required: true },
    sourceFileId: { type: String, required: true, index: true },
    mutualFundName: { type: String, required: true, index: true },
    portfolioDate: { type: String, required: true },
    totalHoldings: { type: Number, required: true },
    holdings: { type: [HoldingSchema], default: [] },
    parseMethod: { type: String, enum: ['manual', 'together'], required: true },
  },
  { collection: 'portfolios', timestamps: true, versionKey: false }
);

export const PortfolioModel = model<IPortfolio>('Portfolio', PortfolioSchema);
