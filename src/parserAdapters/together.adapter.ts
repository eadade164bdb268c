// src/parserAdapters/together.adapter.ts
import OpenAI from 'openai';
import { z } from 'zod';
import { IPortfolioData } from '../models/portfolio.model';
import { SheetRows } from '../utils/workbook';
import { logger } from '../utils/logger';
import { IPortfolioParser, SheetInput } from './parser.interface';

export interface ChatCompletionOptions {
  systemPrompt: string;
  userPrompt: string;
}

/** Minimal seam over the chat completion API so the parser can be tested without a network. */
export interface IChatClient {
  chatCompletion(options: ChatCompletionOptions): Promise<string>;
}

export interface TogetherClientOptions {
  apiKey?: string;
  baseURL: string;
  model: string;
  timeoutMs: number;
}

/** Together AI through its OpenAI-compatible endpoint. */
export class TogetherChatClient implements IChatClient {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: TogetherClientOptions) {
    if (!options.apiKey) {
      throw new Error('TOGETHER_API_KEY is not configured');
    }
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 1,
    });
    this.model = options.model;
  }

  public async chatCompletion(options: ChatCompletionOptions): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: options.systemPrompt },
        { role: 'user', content: options.userPrompt },
      ],
      temperature: 0,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Empty response from Together AI');
    }
    logger.debug('Together AI chat completion', {
      model: this.model,
      promptLength: options.userPrompt.length,
      responseLength: content.length,
    });
    return content;
  }
}

const HoldingReplySchema = z.object({
  name_of_instrument: z.string().min(1),
  isin_code: z.string().nullish(),
  percentage_to_nav: z.union([z.string(), z.number()]).nullish(),
});

const PortfolioReplySchema = z.object({
  mutual_fund_name: z.string().min(1),
  portfolio_date: z.string().min(1),
  total_holdings: z.number().optional(),
  portfolio_holdings: z.array(HoldingReplySchema),
});

export type PortfolioReply = z.infer<typeof PortfolioReplySchema>;

const SYSTEM_PROMPT = 'You are a precise financial data extractor. Return only JSON.';

/** Extracts the JSON object from a model reply, tolerating markdown fences and chatter. */
export function parseJsonReply(content: string): unknown {
  const trimmed = content.trim();
  const fenced = trimmed.match(/```[^\n]*\n([\s\S]*?)```/);
  const candidate = fenced?.[1]?.trim() ?? trimmed;

  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new Error('No JSON object found in model response');
  }
  return JSON.parse(candidate.slice(start, end + 1));
}

function renderTable(rows: SheetRows): string {
  return rows.map(row => row.map(cell => (cell === null ? '' : String(cell))).join(' | ')).join('\n');
}

function buildPrompt(input: SheetInput): string {
  return [
    'Extract ALL holdings from the portfolio table below.',
    'Return ONLY a JSON object with:',
    '- mutual_fund_name: string',
    '- portfolio_date: string such as "March 2025"',
    '- total_holdings: number, equal to the length of portfolio_holdings',
    '- portfolio_holdings: array of { name_of_instrument, isin_code, percentage_to_nav (string with % sign) }',
    'Do not summarize, skip or truncate rows.',
    '',
    `Portfolio from sheet ${input.sheetName}:`,
    renderTable(input.rows),
  ].join('\n');
}

function formatPercentage(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '0.0000%';
  if (typeof value === 'number') return `${value.toFixed(4)}%`;
  const text = value.trim();
  return text.endsWith('%') ? text : `${text}%`;
}

export function toPortfolioData(reply: PortfolioReply): IPortfolioData {
  const holdings = reply.portfolio_holdings.map(holding => ({
    nameOfInstrument: holding.name_of_instrument,
    isinCode: holding.isin_code || 'Unknown',
    percentageToNav: formatPercentage(holding.percentage_to_nav),
  }));
  return {
    mutualFundName: reply.mutual_fund_name,
    portfolioDate: reply.portfolio_date,
    totalHoldings: holdings.length,
    holdings,
  };
}

/** LLM parser: sends the sheet as a text table and validates the JSON reply. */
export class TogetherParser implements IPortfolioParser {
  public readonly method = 'together';

  constructor(private readonly client: IChatClient) {}

  public async parse(input: SheetInput): Promise<IPortfolioData> {
    const content = await this.client.chatCompletion({
      systemPrompt: SYSTEM_PROMPT,
      userPrompt: buildPrompt(input),
    });

    const parsed = PortfolioReplySchema.safeParse(parseJsonReply(content));
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new Error(`Model response failed validation: ${issues}`);
    }
    return toPortfolioData(parsed.data);
  }
}
