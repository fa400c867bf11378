#!/usr/bin/env tsx

import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { isSupportedDocument } from '../../backend/src/documents/text-extractor.js';

['.env.local', '.env']
  .map((file) => path.resolve(process.cwd(), file))
  .forEach((envPath) => {
    loadEnv({ path: envPath, override: false });
  });

const API_BASE_URL = process.env.API_BASE_URL || 'http://localhost:3000/api/v1';
const DEFAULT_KNOWLEDGE_DIR = path.resolve(process.cwd(), 'knowledge');

const entrySummarySchema = z.object({
  id: z.string(),
  fileName: z.string(),
  chunkCount: z.number(),
});

/**
 * Uploads one reference document to the running service.
 */
async function ingestFile(filePath: string): Promise<void> {
  const fileName = path.basename(filePath);
  const content = await readFile(filePath);

  console.log(`📄 Uploading ${fileName} (${content.length} bytes)`);

  const response = await fetch(`${API_BASE_URL}/knowledge/entries`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({ fileName, content: content.toString('base64') }),
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(
      `HTTP ${response.status}: ${errorText || response.statusText}`,
    );
  }

  const entry = entrySummarySchema.parse(await response.json());
  console.log(`✅ Indexed ${entry.fileName} as ${entry.id}, ${entry.chunkCount} chunks`);
}

async function main() {
  const args = process.argv.slice(2);
  const directory = path.resolve(
    args.find((arg) => !arg.startsWith('--')) ??
      process.env.KNOWLEDGE_DIR ??
      DEFAULT_KNOWLEDGE_DIR,
  );

  const files = (await readdir(directory)).filter(isSupportedDocument).sort();
  if (files.length === 0) {
    console.error(`❌ No .pdf, .docx, .txt or .md files found in ${directory}`);
    process.exit(1);
  }

  console.log(`🚀 Ingesting ${files.length} documents from ${directory}\n`);

  let successCount = 0;
  let failCount = 0;
  for (const file of files) {
    try {
      await ingestFile(path.join(directory, file));
      successCount++;
    } catch (error) {
      failCount++;
      console.error(`❌ Failed to ingest ${file}:`, error);
    }
  }

  console.log(`\n📊 Done: ${successCount} succeeded, ${failCount} failed`);
  if (failCount > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
