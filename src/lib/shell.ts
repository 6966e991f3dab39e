/**
 * POSIX shell rendering of command invocations, for Dockerfile RUN lines and plans.
 */

import type { CommandInvocation } from '../domain/types';

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a single word for `/bin/sh`. Words made only of safe characters pass through unchanged.
 */
export function quoteShellWord(word: string): string {
  if (word === '') return "''";
  if (SAFE_WORD.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

export function renderInvocation(invocation: CommandInvocation): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(invocation.env ?? {})) {
    parts.push(`${key}=${quoteShellWord(value)}`);
  }
  parts.push(quoteShellWord(invocation.command), ...invocation.args.map(quoteShellWord));
  if (invocation.stdoutTo) {
    parts.push('>', quoteShellWord(invocation.stdoutTo));
  }
  return parts.join(' ');
}

/**
 * Join invocations so the line stops at the first failure.
 *
 * A non-zero expected exit code is rendered as an explicit status test.
 */
export function renderInvocations(invocations: CommandInvocation[]): string {
  return invocations
    .map((invocation) => {
      const rendered = renderInvocation(invocation);
      if (invocation.expectedExitCode === 0) return rendered;
      return `{ ${rendered}; test $? -eq ${invocation.expectedExitCode}; }`;
    })
    .join(' && ');
}
