// src/routes/portfolio.routes.ts
import { Router } from 'express';
import {
    PortfolioController,
    isinParamValidation,
    listPortfoliosValidation,
    portfolioIdParamValidation,
} from '../controllers/portfolio.controller';

export function createPortfolioRouter(controller: PortfolioController): Router {
    const router = Router();

    // GET /portfolios - List saved portfolios, by fund name
    router.get('/', listPortfoliosValidation, controller.listPortfolios);

    // GET /portfolios/holdings/:isinCode - Funds holding one instrument
    router.get('/holdings/:isinCode', isinParamValidation, controller.getHoldingsByIsin);

    // GET /portfolios/:portfolioId - One portfolio with its holdings
    router.get('/:portfolioId', portfolioIdParamValidation, controller.getPortfolio);

    return router;
}
