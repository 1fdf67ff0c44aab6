import chalk from 'chalk';
import type { PublishResult, RunSummary } from './publisher.js';

/**
 * Base formatter interface
 */
export interface Formatter {
  formatResult(result: PublishResult): string;
  formatSummary(summary: RunSummary): string;
}

/**
 * XML escape helper
 */
function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

const SKIP_REASONS = {
  'not-shared': 'wiki.share is not true',
  'no-frontmatter': 'no front-matter',
} as const;

/**
 * Human-readable formatter with colors
 */
export class HumanFormatter implements Formatter {
  formatResult(result: PublishResult): string {
    switch (result.status) {
      case 'created':
        return chalk.green(`  + ${result.path} → "${result.title}" (page ${result.pageId || 'dry-run'})`);
      case 'updated':
        return chalk.yellow(`  ~ ${result.path} → "${result.title}" (page ${result.pageId}, version ${result.version})`);
      case 'skipped':
        return chalk.gray(`  - ${result.path} skipped: ${SKIP_REASONS[result.reason]}`);
      case 'failed':
        return chalk.red(`  ✗ ${result.path}: ${result.error.message}`);
    }
  }

  formatSummary(summary: RunSummary): string {
    const lines: string[] = [];

    const failures = summary.results.filter((result) => result.status === 'failed');
    if (failures.length > 0) {
      lines.push(chalk.red.bold('Failed:'));
      for (const failure of failures) {
        lines.push(this.formatResult(failure));
      }
      lines.push('');
    }

    if (summary.results.length === 0) {
      lines.push(chalk.gray('No documents to publish.'));
    } else {
      lines.push(
        chalk.gray(
          `Summary: ${summary.created} created, ${summary.updated} updated, ${summary.skipped} skipped, ${summary.failed} failed`,
        ),
      );
    }

    return lines.join('\n');
  }
}

/**
 * XML formatter for machine consumption
 */
export class XmlFormatter implements Formatter {
  formatResult(result: PublishResult): string {
    const path = `path="${escapeXml(result.path)}"`;
    switch (result.status) {
      case 'created':
        return `<created ${path} page-id="${escapeXml(result.pageId)}" title="${escapeXml(result.title)}" />`;
      case 'updated':
        return `<updated ${path} page-id="${escapeXml(result.pageId)}" title="${escapeXml(result.title)}" version="${result.version}" />`;
      case 'skipped':
        return `<skipped ${path} reason="${result.reason}" />`;
      case 'failed':
        return `<failed ${path} error="${escapeXml(result.error.name)}">${escapeXml(result.error.message)}</failed>`;
    }
  }

  formatSummary(summary: RunSummary): string {
    const lines = [
      `<publish created="${summary.created}" updated="${summary.updated}" skipped="${summary.skipped}" failed="${summary.failed}">`,
    ];
    for (const result of summary.results) {
      lines.push(`  ${this.formatResult(result)}`);
    }
    lines.push('</publish>');
    return lines.join('\n');
  }
}

/**
 * Get the appropriate formatter based on output mode
 */
export function getFormatter(xml: boolean): Formatter {
  return xml ? new XmlFormatter() : new HumanFormatter();
}
