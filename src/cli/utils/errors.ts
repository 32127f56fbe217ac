import chalk from 'chalk';
import {
  CancellationError,
  HttpClientError,
  RetriesExhaustedError,
  isResponseError,
} from '../../index.js';

/** Central error handler for CLI commands. */
export function handleError(error: unknown): void {
  if (error instanceof CancellationError) {
    console.error('\n' + chalk.yellow('Request cancelled'));
    console.error(error.message);
  } else if (error instanceof RetriesExhaustedError) {
    console.error(chalk.red('Error:'), error.message);
    if (!error.response.isEmpty()) {
      console.error(chalk.gray(`last response: HTTP ${error.response.statusCode()}`));
    }
  } else if (isResponseError(error)) {
    console.error(chalk.red('Error:'), error.message);
  } else if (error instanceof HttpClientError) {
    console.error(chalk.red('Error:'), error.message);
    console.error(chalk.gray(`[${error.code}]`));
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}
