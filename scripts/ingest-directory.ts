import { Command } from 'commander';
import dotenv from 'dotenv';

import { loadConfig } from '../src/config';
import { ingestDirectory } from '../src/pipeline/ingestDirectory';
import { createServices } from '../src/services';

dotenv.config();

const program = new Command()
  .name('ingest-directory')
  .description('Upload and index every PDF in a directory')
  .argument('<dir>', 'directory containing PDF files')
  .requiredOption('--owner <id>', 'id of the faculty member who owns the documents')
  .requiredOption('--course <name>', 'course the documents belong to')
  .action(async (dir: string, options: { owner: string; course: string }) => {
    const services = createServices(loadConfig());
    const records = await ingestDirectory(services, { dir, ownerId: options.owner, courseName: options.course });

    records.forEach((record) => {
      const outcome = record.status === 'completed'
        ? `${record.chunksCreated ?? 0} chunk(s)`
        : `failed: ${record.errorMessage ?? 'unknown error'}`;
      console.info(`${record.status === 'completed' ? 'OK  ' : 'FAIL'} ${record.filename} [${record.id}] ${outcome}`);
    });

    if (records.some((record) => record.status === 'failed')) {
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
