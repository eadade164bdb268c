// src/parserAdapters/adapter.factory.ts
import { ParseMethod } from '../config/env';
import { IPortfolioParser } from './parser.interface';
import { ManualParser } from './manual.adapter';
import { IChatClient, TogetherChatClient, TogetherClientOptions, TogetherParser } from './together.adapter';

export interface IParserFactory {
  getParser(method: ParseMethod): IPortfolioParser;
}

export interface ParserFactoryOptions {
  together: TogetherClientOptions;
  /** Overrides the Together client, mainly for tests. */
  chatClient?: IChatClient;
}

/**
 * Factory to retrieve the parser for a parse method.
 */
export class ParserAdapterFactory implements IParserFactory {
  private readonly manual = new ManualParser();
  private together: TogetherParser | null = null;

  constructor(private readonly options: ParserFactoryOptions) {}

  /**
   * @throws {Error} - if the method needs configuration that is missing (e.g. no API key).
   */
  public getParser(method: ParseMethod): IPortfolioParser {
    switch (method) {
      case 'manual':
        return this.manual;
      case 'together':
        if (!this.together) {
          this.together = new TogetherParser(this.options.chatClient ?? new TogetherChatClient(this.options.together));
        }
        return this.together;
      default:
        throw new Error(`Unsupported parse method: ${String(method)}`);
    }
  }
}
