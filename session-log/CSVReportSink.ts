import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ReportSink, SessionReport } from './types';
import { relayLogger } from '../shared/RelayLogger';

/**
 * Writes each session report to its own CSV file.
 */
export class CSVReportSink implements ReportSink {
    private readonly outputDir: string;
    private lastFilePath: string | null = null;

    constructor(outputDir: string) {
        this.outputDir = CSVReportSink.expandHomePath(outputDir);
    }

    async persist(report: SessionReport): Promise<void> {
        const fileName = CSVReportSink.generateFilename(report.source.endedAt, report.source.sessionId);
        const filePath = path.join(this.outputDir, fileName);

        await fs.promises.mkdir(this.outputDir, { recursive: true });
        await fs.promises.writeFile(filePath, CSVReportSink.generateCSVContent(report), 'utf-8');

        this.lastFilePath = filePath;
        relayLogger.info(`Report written: ${filePath} (${report.rows.length} rows)`, undefined, 'REPORT');
    }

    getLastFilePath(): string | null {
        return this.lastFilePath;
    }

    /**
     * Generate CSV content string.
     */
    static generateCSVContent(report: SessionReport): string {
        const lines: string[] = [];

        lines.push(CSVReportSink.toLine([report.title]));
        lines.push('');
        for (const entry of report.summary) {
            lines.push(CSVReportSink.toLine(entry));
        }
        lines.push('');
        lines.push(CSVReportSink.toLine(report.header));
        for (const row of report.rows) {
            lines.push(CSVReportSink.toLine(row));
        }

        return lines.join('\n') + '\n';
    }

    static escapeCell(value: string): string {
        return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
    }

    /**
     * Generate filename from the session end time (UTC) and id prefix.
     */
    static generateFilename(endedAt: number, sessionId: string): string {
        const stamp = new Date(endedAt).toISOString().replace(/[:.]/g, '-');
        return `latency-report_${stamp}_${sessionId.slice(0, 8)}.csv`;
    }

    /**
     * Expand a leading ~ to the home directory.
     */
    static expandHomePath(filePath: string): string {
        if (filePath === '~') return os.homedir();
        if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
            return path.join(os.homedir(), filePath.slice(2));
        }
        return filePath;
    }

    private static toLine(cells: readonly string[]): string {
        return cells.map(cell => CSVReportSink.escapeCell(cell)).join(',');
    }
}
