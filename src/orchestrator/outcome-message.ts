/**
 * Human-readable summary of a finished import run
 */

import type { ImportTerminal } from '../types/index.js';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function describeTerminal(fileName: string, terminal: ImportTerminal): string {
  switch (terminal.status) {
    case 'imported':
      return `File '${fileName}' downloaded and imported to the library (${plural(terminal.importedCount, 'book')} imported)`;

    case 'partially_imported':
      return `File '${fileName}' downloaded and partially imported to the library (${terminal.importedCount} imported, ${terminal.failedCount} failed)`;

    case 'no_new_imports':
      return `File '${fileName}' downloaded to bookdrop, but no new books were imported after ${plural(terminal.attempts, 'attempt')}`;

    case 'failed':
      switch (terminal.reason) {
        case 'rescan':
          return `File '${fileName}' downloaded, but failed to trigger bookdrop scan: ${terminal.error.message}`;
        case 'finalize':
          return `File '${fileName}' downloaded, but failed to complete import: ${terminal.error.message}`;
        case 'timeout':
          return `File '${fileName}' downloaded, but import timed out`;
      }
  }
}
