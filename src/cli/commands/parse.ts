import path from 'node:path';
import dotenv from 'dotenv';
import { getLoggerFor, setGlobalLoggerFactory } from 'global-logger-factory';
import type { CommandModule } from 'yargs';
import { DEFAULT_LANGUAGE, DEFAULT_PAGE_RANGE, ManualParser, OpenAiImageDescriber } from '../../document';
import type { ImageDescriberFactory } from '../../document';
import { ConfigurableLoggerFactory } from '../../logging/ConfigurableLoggerFactory';
import { summarizeRecords, toPrintableRecords } from '../lib/output';

interface ParseArgs {
  file: string;
  from: number;
  to: number;
  lang: string;
  layout: string;
  'chunk-token-num': number;
  json: boolean;
  'log-level': string;
  'log-file'?: string;
}

/**
 * DEFAULT_API_KEY 存在时才能用视觉模型描述图片
 */
function describerFactoryFromEnv(): ImageDescriberFactory | undefined {
  const apiKey = process.env.DEFAULT_API_KEY;
  if (!apiKey) {
    return undefined;
  }
  const baseUrl = process.env.DEFAULT_BASE_URL || undefined;
  return (model) => new OpenAiImageDescriber({ apiKey, baseUrl, model });
}

export const parseCommand: CommandModule<object, ParseArgs> = {
  command: 'parse <file>',
  describe: 'Split a PDF or Word document into indexable chunks',
  builder: (yargs) =>
    yargs
      .positional('file', {
        type: 'string',
        description: 'Path of the .pdf, .doc or .docx file',
        demandOption: true,
      })
      .option('from', {
        type: 'number',
        description: 'First page (0-based, inclusive)',
        default: DEFAULT_PAGE_RANGE.from,
      })
      .option('to', {
        type: 'number',
        description: 'Last page (exclusive)',
        default: DEFAULT_PAGE_RANGE.to,
      })
      .option('lang', {
        type: 'string',
        description: 'Language hint for downstream tokenization',
        default: DEFAULT_LANGUAGE,
      })
      .option('layout', {
        type: 'string',
        description: 'Layout recognizer: DeepDOC, "Plain Text" or a vision model name',
        default: 'Plain Text',
      })
      .option('chunk-token-num', {
        type: 'number',
        description: 'Advisory chunk size passed through as metadata',
        default: 512,
      })
      .option('json', {
        type: 'boolean',
        description: 'Output records as JSON',
        default: false,
      })
      .option('log-level', {
        type: 'string',
        description: 'Log level',
        default: process.env.DOCSECTION_LOGGING_LEVEL || 'info',
      })
      .option('log-file', {
        type: 'string',
        description: 'Rotated log file pattern, e.g. logs/docsection-%DATE%.log',
      }),
  handler: async (argv) => {
    dotenv.config();
    setGlobalLoggerFactory(new ConfigurableLoggerFactory(argv['log-level'], { fileName: argv['log-file'], showLocation: true }));
    const logger = getLoggerFor('parse');

    const parser = new ManualParser({ imageDescriberFactory: describerFactoryFromEnv() });
    try {
      const records = await parser.parse(
        { name: path.basename(argv.file), filePath: argv.file },
        {
          range: { from: argv.from, to: argv.to },
          language: argv.lang,
          config: { chunk_token_num: argv['chunk-token-num'], layout_recognize: argv.layout },
          progress: (progress, message) => {
            logger.info(progress === undefined ? message : `[${Math.round(progress * 100)}%] ${message}`);
          },
        },
      );

      if (argv.json) {
        console.log(JSON.stringify(toPrintableRecords(records), null, 2));
        return;
      }
      if (records.length === 0) {
        console.log('No records.');
        return;
      }
      for (const line of summarizeRecords(records)) {
        console.log(line);
      }
    } catch (error: unknown) {
      console.error(`Failed to parse ${argv.file}: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  },
};
