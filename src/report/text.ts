/**
 * Human-readable report for the terminal.
 */

import chalk from "chalk";
import { SEVERITY_RANK, Severity } from "../analysis/checks";
import { CheckedRepository } from "./types";

export interface TextReportOptions {
  /** Emit ANSI styles (bold headline) */
  color: boolean;
}

const SEVERITY_ICONS: Record<Severity, string> = {
  red: "🚩",
  yellow: "⚠️",
  green: "✔",
};

function formatRepository(result: CheckedRepository, style: chalk.Chalk): string {
  const { report, findings, diagnostics } = result;
  const lines: string[] = [];

  if (findings.length > 0) {
    lines.push(style.bold(`# Report for ${report.shortname} (${report.url})`), "");

    const shown = findings
      .filter((finding) => !finding.ignored)
      .sort((a, b) => SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity]);
    for (const finding of shown) {
      lines.push(`* ${SEVERITY_ICONS[finding.severity]} ${finding.category}: ${finding.indicator}`);
    }

    const ignored = findings.length - shown.length;
    if (ignored > 0) {
      lines.push(`* 💡 There were ${ignored} finding(s) that you explicitly ignored`);
    }
  }

  if (diagnostics.impossibleChecks.length > 0) {
    lines.push(`* 💡 The following checks could not be executed: ${diagnostics.impossibleChecks.join(", ")}`);
  }

  return lines.join("\n");
}

/**
 * Render all checked repositories, separated by a blank line.
 */
export function formatTextReport(results: readonly CheckedRepository[], options: TextReportOptions): string {
  const style = new chalk.Instance({ level: options.color ? 1 : 0 });
  return results.map((result) => formatRepository(result, style)).join("\n\n");
}
