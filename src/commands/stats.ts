import chalk from 'chalk';
import { z } from 'zod';
import { errorMessage } from '../core/errors.js';

const WireStatsSchema = z.record(z.string(), z.object({
  backup_count: z.number(),
  total_size_gb: z.number(),
  max_size_gb: z.number(),
  backups: z.array(z.object({
    filename: z.string(),
    size_mb: z.number(),
    modified: z.string(),
  })),
}));

export type WireStats = z.infer<typeof WireStatsSchema>;

export async function fetchStats(baseUrl: string, stream?: string): Promise<WireStats> {
  const url = new URL('/stats', baseUrl);
  if (stream) url.searchParams.set('stream', stream);

  const response = await fetch(url, { signal: AbortSignal.timeout(10_000) });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status}: ${await response.text()}`);
  }
  return WireStatsSchema.parse(await response.json());
}

export const statsCommand = async (options: { url: string; stream?: string }) => {
  try {
    const stats = await fetchStats(options.url, options.stream);
    for (const [stream, s] of Object.entries(stats)) {
      const limit = s.max_size_gb > 0 ? `${Number(s.max_size_gb.toPrecision(3))} GB` : 'unlimited';
      console.log(chalk.bold.blue(`\n[${stream}] ${s.backup_count} backups, ${s.total_size_gb} GB / ${limit}`));
      if (s.backups.length === 0) {
        console.log(chalk.dim('  No backups stored.'));
      }
      for (const b of s.backups) {
        console.log(`  - ${b.filename}  ${chalk.dim(`${b.size_mb} MB  ${b.modified}`)}`);
      }
    }
  } catch (err) {
    console.error(chalk.red(`\n[x] Stats query failed: ${errorMessage(err)}`));
    process.exitCode = 1;
  }
};
