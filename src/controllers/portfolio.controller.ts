// src/controllers/portfolio.controller.ts
import { Request, Response } from 'express';
import { param, query, validationResult } from 'express-validator';
import { IPortfolioStore } from '../services/portfolioStore';
import { ResponseBuilder } from '../utils/response-builder';
import { errorMessage } from '../utils/errors';
import { toHoldingPositions, toPortfolioDTO, toPortfolioSummaryDTO } from '../utils/portfolioMapper';
import { logger } from '../utils/logger';
import { ErrorCode } from '../types/error-dtos';

export interface PortfolioControllerDeps {
    portfolios: IPortfolioStore;
}

const DEFAULT_LIST_LIMIT = 50;

function queryString(source: unknown): string | undefined {
    return typeof source === 'string' && source.trim() !== '' ? source.trim() : undefined;
}

// --- Validation Middleware ---

export const portfolioIdParamValidation = [
    param('portfolioId').isString().isLength({ min: 1, max: 128 }).withMessage('Portfolio ID is required.'),
];

export const listPortfoliosValidation = [
    query('fund_name').optional().isString().isLength({ max: 200 }).withMessage('fund_name must be a string of at most 200 characters.'),
    query('source_file_id').optional().isString().withMessage('source_file_id must be a string.'),
    query('limit').optional().isInt({ min: 1, max: 500 }).withMessage('limit must be an integer between 1 and 500.'),
];

export const isinParamValidation = [
    param('isinCode').matches(/^[A-Za-z0-9]{12}$/).withMessage('isinCode must be a 12-character ISIN.'),
];

function sendUnexpected(res: Response, error: unknown, context: string): void {
    logger.error(`Error ${context}`, { error });
    return ResponseBuilder.error(res, ErrorCode.INTERNAL_SERVER_ERROR, `Failed ${context}: ${errorMessage(error)}`, 500);
}

// --- Portfolio Controllers ---

export function createPortfolioController(deps: PortfolioControllerDeps) {
    const { portfolios } = deps;

    /** Portfolio saved from one sheet, with its holdings. GET /portfolios/:portfolioId */
    const getPortfolio = async (req: Request, res: Response): Promise<void> => {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
            return ResponseBuilder.fromValidationResult(res, errors);
        }

        try {
            const portfolio = await portfolios.findById(req.params.portfolioId);
            if (!portfolio) {
                return ResponseBuilder.error(res, ErrorCode.NOT_FOUND, `Portfolio not found: ${req.params.portfolioId}`, 404);
            }
            return ResponseBuilder.success(res, toPortfolioDTO(portfolio));
        } catch (error: unknown) {
            return sendUnexpected(res, error, 'to read portfolio');
        }
    };

    /** GET /portfolios?fund_name&source_file_id&limit */
    const listPortfolios = async (req: Request, res: Response): Promise<void> => {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
            return ResponseBuilder.fromValidationResult(res, errors);
        }

        try {
            const fundName = queryString(req.query.fund_name);
            const sourceFileId = queryString(req.query.source_file_id);
            const rawLimit = queryString(req.query.limit);
            const limit = rawLimit === undefined ? DEFAULT_LIST_LIMIT : parseInt(rawLimit, 10);

            const found = await portfolios.list({ fundName, sourceFileId, limit });
            return ResponseBuilder.success(res, {
                portfolios: found.map(toPortfolioSummaryDTO),
                total_count: found.length,
                filter: { fund_name: fundName ?? null, source_file_id: sourceFileId ?? null, limit },
            });
        } catch (error: unknown) {
            return sendUnexpected(res, error, 'to list portfolios');
        }
    };

    /** Every fund holding one instrument. GET /portfolios/holdings/:isinCode */
    const getHoldingsByIsin = async (req: Request, res: Response): Promise<void> => {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
            return ResponseBuilder.fromValidationResult(res, errors);
        }

        try {
            const isinCode = req.params.isinCode.toUpperCase();
            const found = await portfolios.list({ isinCode });
            const holdings = toHoldingPositions(found, isinCode);
            return ResponseBuilder.success(res, { isin_code: isinCode, total_count: holdings.length, holdings });
        } catch (error: unknown) {
            return sendUnexpected(res, error, 'to read holdings');
        }
    };

    return { getPortfolio, listPortfolios, getHoldingsByIsin };
}

export type PortfolioController = ReturnType<typeof createPortfolioController>;
