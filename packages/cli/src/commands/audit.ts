/**
 * audit command: cross-check every game's replay against chess.js
 */

import {
  auditReplay,
  gameTitle,
  type AuditFinding,
  type AuditReport,
  type Game,
} from '@pgnreplay/pgn';

import { AuditFailedError } from '../errors/cli-errors.js';
import { pluralize } from '../progress/formatters.js';

import { runCommand, writeOutput } from './shared.js';

/**
 * One finding, e.g. "  3. exf6 [mismatch] Board differs from the rules reference on f5"
 */
export function formatFinding(finding: AuditFinding): string {
  const dots = finding.side === 'white' ? '.' : '...';
  return `  ${finding.moveNumber}${dots} ${finding.san} [${finding.kind}] ${finding.message}`;
}

/**
 * Report block for one game
 */
export function formatAuditReport(report: AuditReport, game: Game, index: number): string {
  const status = report.clean
    ? `clean (${pluralize(report.plies, 'half-move')})`
    : pluralize(report.findings.length, 'finding');
  const header = `Game ${index + 1}: ${gameTitle(game)}: ${status}`;
  return [header, ...report.findings.map(formatFinding)].join('\n');
}

/**
 * audit command handler
 */
export async function auditCommand(rawOptions: Record<string, unknown>): Promise<void> {
  await runCommand(rawOptions, ({ config, reporter, games }) => {
    reporter.startPhase('auditing', pluralize(games.length, 'game'));
    const reports = games.map((game) =>
      auditReplay(game, { disambiguation: config.replay.disambiguation }),
    );
    const findings = reports.reduce((total, report) => total + report.findings.length, 0);
    reporter.completePhase('auditing', pluralize(findings, 'finding'));

    const blocks = reports.flatMap((report, index) => {
      const game = games[index];
      return game ? [formatAuditReport(report, game, index)] : [];
    });
    writeOutput(blocks.join('\n'), undefined);

    if (findings > 0) {
      const diverging = reports.filter((report) => !report.clean).length;
      reporter.printError(`${pluralize(diverging, 'game')} diverged from the rules reference`);
      throw new AuditFailedError(findings);
    }
    reporter.printSuccess(`${pluralize(games.length, 'game')} replayed cleanly`);
  });
}
