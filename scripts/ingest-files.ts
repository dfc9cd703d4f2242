#!/usr/bin/env tsx
/**
 * Walks a directory and sends every supported file to the ingestion API.
 * Usage: npm run ingest -- <directory> [--dry-run]
 */

import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { inferMimeType, titleFromFilename } from './mime-types.js';

['.env.local', '.env']
  .map((file) => path.resolve(process.cwd(), file))
  .forEach((envPath) => {
    loadEnv({ path: envPath, override: false });
  });

const API_BASE_URL = process.env.API_BASE_URL || 'http://localhost:3000/api/v1';

const ingestionResultSchema = z.object({
  documentId: z.string(),
  sourceUri: z.string(),
  status: z.enum(['accepted', 'rejected']),
  reason: z.string().optional(),
  code: z.string().optional(),
  chunkCount: z.number().optional(),
  unchanged: z.boolean().optional(),
});

type IngestionResult = z.infer<typeof ingestionResultSchema>;

interface Summary {
  accepted: number;
  unchanged: number;
  rejected: number;
  failed: number;
  skipped: number;
}

async function collectFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith('.')) {
      continue;
    }
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files.sort();
}

async function ingestFile(filePath: string, mimeType: string): Promise<IngestionResult> {
  const bytes = await readFile(filePath);
  const payload = {
    sourceUri: pathToFileURL(filePath).href,
    mimeType,
    content: bytes.toString('base64'),
    title: titleFromFilename(filePath),
    metadata: {
      filename: path.basename(filePath),
      fileSize: bytes.length,
    },
  };

  const response = await fetch(`${API_BASE_URL}/knowledge/documents`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(payload),
  });

  // 422 still carries a per-document result
  if (!response.ok && response.status !== 422) {
    const errorText = await response.text();
    throw new Error(`HTTP ${response.status}: ${errorText || response.statusText}`);
  }
  return ingestionResultSchema.parse(await response.json());
}

async function main() {
  const args = process.argv.slice(2);
  const dryRun = args.includes('--dry-run');
  const directory = path.resolve(
    process.cwd(),
    args.find((arg) => !arg.startsWith('--')) ?? 'docs',
  );

  const files = await collectFiles(directory);
  console.log(`📂 Found ${files.length} files under ${directory}`);

  const summary: Summary = { accepted: 0, unchanged: 0, rejected: 0, failed: 0, skipped: 0 };

  for (const filePath of files) {
    const relative = path.relative(directory, filePath);
    const mimeType = inferMimeType(filePath);
    if (!mimeType) {
      summary.skipped += 1;
      console.log(`⏭️  ${relative}: unsupported file type`);
      continue;
    }
    if (dryRun) {
      console.log(`📝 ${relative} (${mimeType})`);
      continue;
    }

    try {
      const result = await ingestFile(filePath, mimeType);
      if (result.status === 'rejected') {
        summary.rejected += 1;
        console.warn(`⚠️  ${relative}: rejected [${result.code ?? 'unknown'}] ${result.reason ?? ''}`);
      } else if (result.unchanged) {
        summary.unchanged += 1;
        console.log(`✅ ${relative}: unchanged`);
      } else {
        summary.accepted += 1;
        console.log(`✅ ${relative}: ${result.chunkCount ?? 0} chunks`);
      }
    } catch (error) {
      summary.failed += 1;
      console.error(`❌ ${relative}:`, error);
    }
  }

  console.log('\n📊 Summary:');
  console.log(`   - accepted: ${summary.accepted}`);
  console.log(`   - unchanged: ${summary.unchanged}`);
  console.log(`   - rejected: ${summary.rejected}`);
  console.log(`   - failed: ${summary.failed}`);
  console.log(`   - skipped: ${summary.skipped}`);

  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
