import { createRagService } from '../services/rag';
import { SOURCE_DIR } from '../constants/dirs';
import { log, error } from '../utils/logger';

async function main() {
  log('=== Document Feed Script ===\n');

  const sourceDir = process.argv[2] || SOURCE_DIR;
  const ownerId = process.argv[3] || process.env.OWNER_ID;
  if (!ownerId) {
    error('Usage: feed <directory> <ownerId>  (or set OWNER_ID)');
    process.exit(1);
  }

  // Start timer
  const startTime = performance.now();

  const rag = createRagService();
  log(`Source directory: ${sourceDir}`);
  log(`Owner: ${ownerId}\n`);

  try {
    const results = await rag.ingestDirectory(sourceDir, ownerId);

    const elapsedSeconds = ((performance.now() - startTime) / 1000).toFixed(2);
    const successful = results.filter(r => r.success);
    const failed = results.filter(r => !r.success);
    const totalChunks = successful.reduce((sum, r) => sum + r.chunks_created, 0);

    log('\n=== Ingestion Summary ===');
    log(`Total files processed: ${results.length}`);
    log(`Successful: ${successful.length}`);
    log(`Failed: ${failed.length}`);
    log(`Total chunks created: ${totalChunks}`);
    log(`\nTime elapsed: ${elapsedSeconds}s`);

    if (failed.length > 0) {
      log('\nFailed files:');
      failed.forEach(f => {
        log(`  - ${f.source}: ${f.error}`);
      });
      process.exitCode = 1;
    }
  } finally {
    rag.close();
  }

  log('\n✓ Feed complete!');
}

main().catch(err => {
  error('Fatal error:', err);
  process.exit(1);
});
