/**
 * Output Formatter
 *
 * Human-readable rendering of findings for the validate command.
 */

import chalk from 'chalk';
import type { X12Finding } from '../../x12/Findings.js';
import type { ValidationResult } from '../../x12/X12ClaimsEngine.js';

type ColorFn = (text: string) => string;

/**
 * Envelope problems are red, hierarchy problems yellow, data-quality signals cyan.
 */
export function getFindingColor(finding: X12Finding): ColorFn {
  switch (finding.kind) {
    case 'EnvelopeMismatch':
      return chalk.red;
    case 'HierarchyMismatch':
      return chalk.yellow;
    case 'MissingField':
    case 'MissingServiceSegment':
      return chalk.cyan;
  }
}

export function findingLabel(finding: X12Finding): string {
  switch (finding.kind) {
    case 'EnvelopeMismatch':
    case 'HierarchyMismatch':
      return finding.code;
    case 'MissingField':
      return finding.field ? `MissingField ${finding.field}` : 'MissingField';
    case 'MissingServiceSegment':
      return 'MissingServiceSegment';
  }
}

/**
 * One line per finding:
 *   #5    SE   SegmentCountMismatch          SE01 declares "6" segments, found 5
 */
export function formatFindingLine(finding: X12Finding): string {
  const position = chalk.gray(`#${finding.position}`.padEnd(6));
  const segmentId = finding.segmentId.padEnd(4);
  const label = getFindingColor(finding)(findingLabel(finding).padEnd(30));
  return `  ${position}${segmentId} ${label}${finding.message}`;
}

export function formatValidationReport(file: string, result: ValidationResult): string {
  const lines: string[] = [];
  const summary = `${result.segmentCount} segment(s), ${result.claimCount} claim(s)`;

  if (result.findings.length === 0) {
    lines.push(`${chalk.green('✔')} ${chalk.bold(file)}: ${summary}, no findings`);
  } else {
    lines.push(
      `${chalk.yellow('!')} ${chalk.bold(file)}: ${summary}, ${result.findings.length} finding(s)`
    );
    lines.push('');
    for (const finding of result.findings) {
      lines.push(formatFindingLine(finding));
    }
  }

  return lines.join('\n');
}
