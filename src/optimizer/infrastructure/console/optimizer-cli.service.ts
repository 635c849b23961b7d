import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { createInterface } from 'readline';
import { parseArgs } from 'util';
import optimizerConfig from '../../config/optimizer.config';
import { IntervalOptimizerService } from '../../domain/services/interval-optimizer.service';
import { TradeOffInputSchema } from '../../application/dto/trade-off-input.dto';
import {
  renderReport,
  summarizeSelection,
} from '../../application/utils/selection-report.util';
import { IntervalCsvParser } from '../csv/interval-csv.parser';
import { LoggerService } from '../logging/logger.service';

export const TRADE_OFF_PROMPT = 'Enter the trade-off parameter (0 to 1): ';

export interface CliStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

@Injectable()
export class OptimizerCliService {
  constructor(
    private readonly csvParser: IntervalCsvParser,
    private readonly intervalOptimizer: IntervalOptimizerService,
    @Inject(optimizerConfig.KEY)
    private readonly config: ConfigType<typeof optimizerConfig>,
    private readonly logger: LoggerService,
  ) {}

  /**
   * `[--file <csv>] [--trade-off <number>]`. Intervals are loaded before the
   * trade-off is asked for; any failure aborts before the report is written.
   */
  async run(argv: string[], streams: CliStreams): Promise<void> {
    const options = this.parseArguments(argv);
    const path = options.file ?? this.config.intervalsCsvPath;

    const intervals = await this.csvParser.parseFile(path);
    const tradeOff = this.parseTradeOff(
      options.tradeOff ?? (await this.promptTradeOff(streams)),
    );

    const result = this.intervalOptimizer.optimize(intervals, tradeOff);
    const summary = summarizeSelection(result.selected);

    streams.output.write(
      renderReport({
        selected: result.selected,
        score: result.score,
        ...summary,
      }),
    );

    this.logger.log({
      op: 'cli_optimize',
      outcome: 'success',
      intervalCount: intervals.length,
      tradeOff,
      selectedCount: summary.selectedCount,
    });
  }

  private parseArguments(argv: string[]): { file?: string; tradeOff?: string } {
    try {
      const { values } = parseArgs({
        args: argv,
        options: {
          file: { type: 'string', short: 'f' },
          'trade-off': { type: 'string', short: 't' },
        },
        strict: true,
        allowPositionals: false,
      });
      return { file: values.file, tradeOff: values['trade-off'] };
    } catch (error) {
      throw new CliUsageError(
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  private parseTradeOff(text: string): number {
    const result = TradeOffInputSchema.safeParse(text);
    if (!result.success) {
      throw new CliUsageError(
        `Invalid trade-off "${text}": ${result.error.issues[0].message}`,
      );
    }
    return result.data;
  }

  private promptTradeOff(streams: CliStreams): Promise<string> {
    const rl = createInterface({
      input: streams.input,
      output: streams.output,
      terminal: false,
    });

    return new Promise((resolve, reject) => {
      let answered = false;

      rl.once('close', () => {
        if (!answered) {
          reject(new CliUsageError('No trade-off entered'));
        }
      });

      rl.question(TRADE_OFF_PROMPT, (answer) => {
        answered = true;
        rl.close();
        resolve(answer);
      });
    });
  }
}
