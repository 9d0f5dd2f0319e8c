/**
 * reqline: resolve request descriptors from the command line
 */

import {
  Command,
  InvalidArgumentError as InvalidOptionArgumentError,
  Option,
} from '@commander-js/extra-typings';
import { ConsoleTransport, LogLayer } from 'loglayer';
import type { ErrorSerializerType, LogLayerConfig, LogLayerTransport, LogLevel } from 'loglayer';
import { serializeError } from 'serialize-error';

import { loadEnvironmentConfig } from './config.ts';
import type { EnvironmentConfig } from './config.ts';
import { RequestDescriptorError } from './errors.ts';
import { isValidLogLevel } from './log.ts';
import { BASE_URL_KEY, RAW_URL_KEY } from './request/constants.ts';
import type { ParameterMap } from './request/parameter-values.ts';
import { RequestDescriptor } from './request/request-descriptor.ts';

const version = '0.1.0';

export interface AppOptions {
  logLevel: LogLevel;
}

export class App {
  static default(options: AppOptions): App {
    const app = new App({
      serializer: serializeError,
      log: new ConsoleTransport({
        logger: console,
      }),
    });
    app.log.setLevel(options.logLevel);
    return app;
  }

  readonly #log: LogLayer;

  constructor(options: {
    log: LogLayerTransport | LogLayerTransport[];
    serializer?: ErrorSerializerType;
  }) {
    const opts: LogLayerConfig = { transport: options.log };
    if (options.serializer) {
      opts.errorSerializer = options.serializer;
    }

    this.#log = new LogLayer(opts);
  }

  get log(): LogLayer {
    return this.#log;
  }
}

export interface ResolveOptions {
  path: Record<string, string>;
  query: Record<string, string>;
  header: Record<string, string>;
  method: string;
  rawUrl?: string;
  json?: boolean;
}

/**
 * Builds a descriptor from CLI input and renders its resolved URI, or a JSON
 * description of the request when `json` is set.
 */
export function resolveRequest(
  template: string,
  options: ResolveOptions,
  app: App,
  config: Pick<EnvironmentConfig, 'baseUrl'> = {},
): string {
  const descriptor = new RequestDescriptor({ urlTemplate: template, app });
  descriptor.setHttpMethod(options.method);

  const pathParameters: ParameterMap = { ...options.path };
  if (config.baseUrl && pathParameters[BASE_URL_KEY] === undefined) {
    pathParameters[BASE_URL_KEY] = config.baseUrl;
  }
  if (options.rawUrl) {
    pathParameters[RAW_URL_KEY] = options.rawUrl;
  }

  descriptor.setPathParameters(pathParameters);
  descriptor.setQueryParameters({ toQueryParameterEntries: () => Object.entries(options.query) });
  descriptor.setHeaders(options.header);

  const uri = descriptor.getUri();
  if (!options.json) return uri;

  return JSON.stringify(
    { method: descriptor.httpMethod, uri, headers: descriptor.getHeaders() },
    null,
    2,
  );
}

export interface ProgramOutput {
  write(text: string): void;
}

/**
 * Creates the CLI program. Output goes to `output` so the program can be
 * driven from tests.
 */
export function createProgram(
  output: ProgramOutput = { write: (text) => process.stdout.write(text) },
  env: NodeJS.ProcessEnv = process.env,
): Command {
  const config = loadEnvironmentConfig(env);

  const program = new Command()
    .name('reqline')
    .description('Resolve URI templates and request descriptors')
    .version(version);

  const resolve = program
    .command('resolve')
    .description('Expand a URI template and print the resolved request')
    .argument('<template>', 'RFC 6570 URI template, e.g. "{+baseurl}/users/{id}"')
    .addOption(
      new Option('-p, --path <param>', 'Path parameter (format: key=value)')
        .argParser(collectPair('--path'))
        .default({} as Record<string, string>),
    )
    .addOption(
      new Option('-q, --query <param>', 'Query parameter (format: key=value)')
        .argParser(collectPair('--query'))
        .default({} as Record<string, string>),
    )
    .addOption(
      new Option('-H, --header <header>', 'Request header (format: key=value)')
        .argParser(collectPair('--header'))
        .default({} as Record<string, string>),
    )
    .addOption(new Option('-X, --method <method>', 'HTTP method').default('GET'))
    .option('--raw-url <url>', 'Use this URL instead of expanding the template')
    .option('--json', 'Print method, URI and headers as JSON')
    .addOption(
      new Option('-l, --log-level <level>', 'Log level')
        .choices(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
        .default(config.logLevel),
    );

  resolve.action((template, options) => {
    const app = App.default({ logLevel: config.logLevel });
    if (isValidLogLevel(options.logLevel)) {
      app.log.setLevel(options.logLevel);
    }

    for (const warning of config.warnings) {
      app.log.warn(warning);
    }

    try {
      const result = resolveRequest(
        template,
        {
          path: options.path,
          query: options.query,
          header: options.header,
          method: options.method,
          rawUrl: options.rawUrl,
          json: options.json === true,
        },
        app,
        config,
      );
      output.write(`${result}\n`);
    } catch (error) {
      if (error instanceof RequestDescriptorError) {
        resolve.error(`${error.name}: ${error.message}`);
      }
      throw error;
    }
  });

  return program;
}

export const program = createProgram();

// Parse CLI arguments if this is being run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  program.parse();
}

/**
 * Returns a Commander argument parser for repeated `key=value` options. Each
 * call returns a new accumulator with the pair added.
 */
export function collectPair(
  flag: string,
): (input: string, prev: Record<string, string>) => Record<string, string> {
  return (input, prev) => {
    const [key, ...rest] = input.split('=');
    if (!key || rest.length === 0) {
      throw new InvalidOptionArgumentError(`${flag} must be KEY=VALUE (got “${input}”)`);
    }
    return { ...prev, [key]: rest.join('=') }; // allow “X=Y=Z” to keep the = in the value
  };
}
