import {
  IntervalLimiter,
  createClient,
  defaultTransport,
  is2xx,
  newRequest,
  retryOnError,
  retryOnStatus,
  withDecompression,
  withRateLimiter,
  withRetryCondition,
  withRetryCount,
  withRetryDelay,
  withRetryDelayDelta,
  withTimeout,
  withTransport,
  type HttpResponse,
  type Option,
} from '../../index.js';
import { debugCli } from '../../lib/utils/debug.js';
import { createSpinner, render } from '../logger.js';

/** Options accepted by the request command. */
export interface RequestCommandOptions {
  method?: string;
  header?: Array<[string, string]>;
  data?: string;
  retries?: number;
  retryDelay?: number;
  retryDelta?: number;
  timeout?: number;
  retryOn?: number[];
  rate?: number;
  decompress?: boolean;
  include?: boolean;
}

/** Translate CLI flags into client options. */
export function clientOptions(options: RequestCommandOptions): Option[] {
  const result: Option[] = [];
  if (options.retries !== undefined) result.push(withRetryCount(options.retries));
  if (options.retryDelay !== undefined) result.push(withRetryDelay(options.retryDelay));
  if (options.retryDelta !== undefined) result.push(withRetryDelayDelta(options.retryDelta));
  if (options.timeout !== undefined) result.push(withTimeout(options.timeout));
  // Without --retry-on only failures are retried.
  result.push(withRetryCondition(options.retryOn === undefined ? retryOnError : retryOnStatus(...options.retryOn)));
  if (options.rate !== undefined) result.push(withRateLimiter(new IntervalLimiter({ rate: options.rate })));
  if (options.decompress === false) result.push(withDecompression(false));
  return result;
}

function writeHead(response: HttpResponse): void {
  const lines = [`HTTP ${response.statusCode()}`];
  for (const name of Object.keys(response.headers())) {
    for (const value of response.headerValues(name)) lines.push(`${name}: ${value}`);
  }
  process.stdout.write(lines.join('\n') + '\n\n');
}

/** Send one request with the configured retry policy and print the response. */
export async function handleRequestCommand(url: string, options: RequestCommandOptions): Promise<void> {
  const method = options.method ?? (options.data !== undefined ? 'POST' : 'GET');
  const builder = newRequest().setMethod(method).setUrl(url);
  for (const [name, value] of options.header ?? []) builder.setHeader(name, value);
  if (options.data !== undefined) builder.setBody(options.data);
  const request = builder.build();

  const transport = defaultTransport();
  const client = createClient(withTransport(transport), ...clientOptions(options));
  debugCli('request %s %s options=%o', request.method, request.url, options);
  if (options.decompress === false) render.dim('response decompression disabled');

  const spinner = createSpinner().start(`${request.method} ${request.url}`);
  let response: HttpResponse;
  try {
    response = await client.do(request);
  } catch (err) {
    spinner.fail(`${request.method} ${request.url}`);
    throw err;
  } finally {
    await transport.close();
  }

  const status = response.statusCode();
  if (is2xx(status)) spinner.succeed(`HTTP ${status}`);
  else spinner.warn(`HTTP ${status}`);

  if (options.include) writeHead(response);
  process.stdout.write(response.bytes());
  if (!is2xx(status)) render.warn(`${response.requestUrl()} answered ${status}`);
}
