// Copyright 2025-2026 J. Patrick Fulton
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * Structured logging for the synth lifecycle.
 *
 * Format: [LEVEL] [phase] message {context as JSON}
 * info/debug go to stdout, warn/error to stderr. Callers must keep secrets
 * (static keys, IAM tokens) out of both message and context.
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface LogEntryOptions {
  /** Lifecycle phase, e.g. config, synth, checks */
  readonly phase?: string;
  readonly context?: Record<string, unknown>;
}

export function formatLogLine(level: LogLevel, message: string, options?: LogEntryOptions): string {
  const phasePart = options?.phase ? ` [${options.phase}]` : '';
  const contextPart =
    options?.context && Object.keys(options.context).length > 0
      ? ` ${JSON.stringify(options.context)}`
      : '';
  return `[${level.toUpperCase()}]${phasePart} ${message}${contextPart}`;
}

export function log(level: LogLevel, message: string, options?: LogEntryOptions): void {
  const line = formatLogLine(level, message, options);

  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      if (process.env.BUCKET_MODULE_DEBUG) {
        console.log(line);
      }
      break;
    default:
      console.log(line);
      break;
  }
}

export function logInfo(message: string, options?: LogEntryOptions): void {
  log('info', message, options);
}

export function logWarn(message: string, options?: LogEntryOptions): void {
  log('warn', message, options);
}

export function logError(message: string, options?: LogEntryOptions): void {
  log('error', message, options);
}

export function logDebug(message: string, options?: LogEntryOptions): void {
  log('debug', message, options);
}
