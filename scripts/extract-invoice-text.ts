import { readFile } from 'fs/promises';
import { resolveLlmExtraction } from '../src/services/invoiceExtraction';
import { extractionOptionsFromConfig } from '../src/config/extraction';
import { config } from '../src/config/env';

const USAGE = 'Usage: tsx scripts/extract-invoice-text.ts <ocr-text-file> [--llm-reply <reply-file>]';

function readArgs(argv: string[]) {
  const textPath = argv.find((a, i) => !a.startsWith('--') && argv[i - 1] !== '--llm-reply');
  const flagIndex = argv.indexOf('--llm-reply');
  const replyPath = flagIndex >= 0 ? argv[flagIndex + 1] : undefined;
  return { textPath, replyPath };
}

async function main() {
  const { textPath, replyPath } = readArgs(process.argv.slice(2));

  if (!textPath) {
    console.log(USAGE);
    process.exit(1);
  }

  const text = await readFile(textPath, 'utf8');
  const llmReply = replyPath ? await readFile(replyPath, 'utf8') : undefined;

  const resolution = resolveLlmExtraction(text, llmReply, extractionOptionsFromConfig(config));
  console.log(JSON.stringify(resolution, null, 2));
}

main().catch((error: unknown) => {
  console.error('Extraction failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
