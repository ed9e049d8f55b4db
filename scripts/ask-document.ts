/**
 * Ingest a local file and ask a question about it.
 *
 * Usage: npm run ask -- <file> "<question>"
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { createPipelineFromEnv } from '../src/lib/rag/pipeline';

async function main() {
  const [filePath, ...questionWords] = process.argv.slice(2);
  const question = questionWords.join(' ');

  if (!filePath || !question) {
    console.error('Usage: npm run ask -- <file> "<question>"');
    process.exitCode = 1;
    return;
  }

  const pipeline = await createPipelineFromEnv();

  try {
    const upload = await pipeline.uploadDocument(await readFile(filePath), basename(filePath));
    console.log(upload.success ? '✓' : '✗', upload.message);
    if (!upload.success) {
      process.exitCode = 1;
      return;
    }

    const answer = await pipeline.ask({ message: question, documentId: upload.documentId });

    console.log('\n--- Answer ---');
    console.log(answer.response);
    console.log('\n--- Sources ---');
    answer.sources.forEach((source, i) => console.log(`${i + 1}. ${source}`));
    console.log(`\nConfidence: ${answer.confidence}`);
    console.log(`Provider: ${answer.provider}`);
    console.log(`Time: ${answer.processingTimeMs}ms`);
  } finally {
    await pipeline.close();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
