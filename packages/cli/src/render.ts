import type { CLIErrorView } from '@qoslens/core';

const SGR = {
  reset: 0,
  bold: 1,
  red: 31,
} as const;

type Style = keyof typeof SGR;

const SGR_RE = /\u001B\[[\d;]*m/g; // eslint-disable-line no-control-regex

function paint(text: string, styles: readonly Style[], enabled: boolean): string {
  if (!enabled || styles.length === 0) return text;
  const codes = styles.map((style) => SGR[style]).join(';');
  return `\u001B[${codes}m${text}\u001B[${SGR.reset}m`;
}

/**
 * Greedy word wrap. `lead` starts the first line, `hang` indents the
 * continuation lines. A single word longer than the width keeps its own line.
 */
function wrap(text: string, width: number, lead = '', hang = ''): string[] {
  const lines: string[] = [];
  let current = lead;
  let prefix = lead;
  for (const word of text.split(/\s+/).filter(Boolean)) {
    const candidate = current === prefix ? `${current}${word}` : `${current} ${word}`;
    if (candidate.length > width && current !== prefix) {
      lines.push(current);
      prefix = hang;
      current = `${hang}${word}`;
    } else {
      current = candidate;
    }
  }
  if (current !== prefix || lines.length === 0) lines.push(current);
  return lines;
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines: string[] = [paint(`❌ ${view.title}`, ['red', 'bold'], view.colors)];

  if (view.location) {
    // Paths stay on one line for copy/paste
    lines.push(`📍 ${view.location}`);
  }
  if (view.excerpt) {
    lines.push(...wrap(view.excerpt, width, 'Excerpt: '));
  }
  for (const detail of view.details ?? []) {
    lines.push(...wrap(detail, width, '  - ', '    '));
  }
  if (view.usage) {
    lines.push(...wrap(view.usage, width, '💡 Usage: ', '   '));
  }

  return lines.join('\n');
}

/** Removes the SGR sequences `renderCLIView` emits. */
export function stripColors(input: string): string {
  return input.replace(SGR_RE, '');
}
