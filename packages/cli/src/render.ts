import type { CLIErrorView } from '@attrgroups/core';

const RED = '\u001B[31m';
const BOLD = '\u001B[1m';
const RESET = '\u001B[0m';

// CSI and OSC escape sequences
// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g;

/** Outermost style first */
function paint(text: string, ...styles: string[]): string {
  return styles.reduceRight((inner, style) => `${style}${inner}${RESET}`, text);
}

function wrap(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = '';
  for (const word of text.split(/\s+/)) {
    const candidate = current === '' ? word : `${current} ${word}`;
    if (candidate.length > width && current !== '') {
      lines.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  if (current !== '') lines.push(current);
  return lines;
}

/**
 * Title, location, one `  - ` line per detail, then the workaround.
 * Details are never wrapped so attribute paths stay copyable.
 */
export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth > 0 ? view.terminalWidth : 80;
  const lines = [view.colors ? paint(view.title, RED, BOLD) : view.title];

  if (view.location) {
    lines.push(...wrap(view.location, width));
  }
  lines.push(...view.details.map((detail) => `  - ${detail}`));
  if (view.workaround) {
    lines.push(...wrap(`Workaround: ${view.workaround}`, width));
  }
  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  return input.replace(ANSI_PATTERN, '');
}
