import { formatDuration } from './format.js';
import type {
  BenchOptions,
  BenchOutputFormat,
  BenchRecord,
  BenchReport,
  BenchStatistics,
  SampleSet
} from './types.js';

export type BuildReportOptions = Pick<BenchOptions, 'units' | 'sign_digits' | 'pretty' | 'list_timings'>;

export function buildReport(stats: BenchStatistics, samples: SampleSet, options: BuildReportOptions): BenchReport {
  const format = (ns: number) => formatDuration(ns, options.units, options.sign_digits);
  const mean = format(stats.mean);
  const std = format(stats.std);

  if (options.pretty) {
    return { kind: 'pretty', text: `${mean} +/- ${std}` };
  }

  const record: BenchRecord = {
    mean,
    min: format(stats.min),
    max: format(stats.max),
    std
  };

  if (options.list_timings) {
    // Per-round timings are reported exactly as measured.
    record.times = samples.map((sample) => formatDuration(sample, options.units, 0));
  }

  return { kind: 'record', record };
}

function renderRecordTable(record: BenchRecord): string {
  const lines: string[] = [];
  lines.push(`mean: ${record.mean}`);
  lines.push(`min: ${record.min}`);
  lines.push(`max: ${record.max}`);
  lines.push(`std: ${record.std}`);
  if (record.times) {
    lines.push('times:');
    record.times.forEach((time, index) => {
      lines.push(`  ${index + 1}: ${time}`);
    });
  }
  return `${lines.join('\n')}\n`;
}

export function renderReport(report: BenchReport, format: BenchOutputFormat): string {
  if (report.kind === 'pretty') {
    return `${report.text}\n`;
  }
  if (format === 'table') {
    return renderRecordTable(report.record);
  }
  return `${JSON.stringify(report.record, null, 2)}\n`;
}
