import chalk from 'chalk';
import { isAcmeBootstrapError } from '../../lib/errors/acme-errors.js';

/** One-line, kind-aware summary of a failure */
export function describeError(error: unknown): string {
  if (isAcmeBootstrapError(error)) {
    switch (error.kind) {
      case 'network':
        return error.status === undefined
          ? `Network failure after ${error.attempts} attempts` +
              (error.cause instanceof Error ? `: ${error.cause.message}` : '')
          : `Authority kept failing (HTTP ${error.status}) after ${error.attempts} attempts` +
              (error.problem?.detail ? `: ${error.problem.detail}` : '');
      case 'terminal-call':
        return (
          `Authority rejected the request (HTTP ${error.status})` +
          (error.problem ? `: ${error.problem.detail ?? error.problem.type}` : `: ${error.body}`)
        );
      case 'missing-field':
        return `Authority response is missing ${error.location} "${error.field}"`;
      case 'decode':
        return error.message;
      case 'persistence':
        return `Key store ${error.operation} failed for ${error.key}`;
      case 'account-state':
        return error.message;
    }
  }
  if (error instanceof Error) {
    return error.message;
  }
  return `Unknown error: ${String(error)}`;
}

/** Central error handler for CLI commands */
export function handleError(error: unknown): void {
  console.error(chalk.red('Error:'), describeError(error));
}
