#!/usr/bin/env tsx
/**
 * Index content from a JSON file and/or run a similarity query against the
 * configured store.
 *
 * Usage:
 *   tsx scripts/search-content.ts [--index=items.json] [--category=tech] [--k=5] <query...>
 */

import 'reflect-metadata';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { Logger, type LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { config as loadEnv } from 'dotenv';
import {
  AppModule,
  SearchEngineService,
  contentImportSchema,
} from '../backend/src/index.js';

['.env.local', '.env']
  .map((file) => path.resolve(process.cwd(), file))
  .forEach((envPath) => {
    loadEnv({ path: envPath, override: false });
  });

const readOption = (args: string[], name: string): string | undefined =>
  args.find((arg) => arg.startsWith(`--${name}=`))?.slice(name.length + 3);

function logLevelsFor(nodeEnv: string | undefined): LogLevel[] {
  if (nodeEnv === 'production') {
    return ['error', 'warn'];
  }
  if (nodeEnv === 'test') {
    return ['error'];
  }
  return ['log', 'error', 'warn'];
}

async function indexFile(engine: SearchEngineService, file: string) {
  const raw: unknown = JSON.parse(await readFile(path.resolve(process.cwd(), file), 'utf8'));
  const items = contentImportSchema.parse(raw);

  const results = await engine.indexContentBatch(
    items.map(({ id, ...fields }) => ({ id, fields })),
  );

  let indexed = 0;
  results.forEach((result, index) => {
    if (result.ok) {
      indexed++;
    } else {
      console.error(`  ${items[index].id}: ${result.reason} - ${result.message}`);
    }
  });
  console.log(`Indexed ${indexed}/${items.length} item(s) from ${file}`);
}

async function main() {
  const args = process.argv.slice(2);
  const indexPath = readOption(args, 'index');
  const category = readOption(args, 'category');
  const kArg = readOption(args, 'k');
  const k = kArg ? Number.parseInt(kArg, 10) : undefined;
  const query = args.filter((arg) => !arg.startsWith('--')).join(' ');

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevelsFor(process.env.NODE_ENV),
  });

  try {
    const engine = app.get(SearchEngineService);

    if (indexPath) {
      await indexFile(engine, indexPath);
    }

    console.log(`Store holds ${await engine.count()} item(s)`);

    if (!query) {
      return;
    }

    const results = await engine.search({
      text: query,
      category,
      k: k !== undefined && Number.isFinite(k) ? k : undefined,
    });

    if (results.length === 0) {
      console.log('No results');
      return;
    }

    results.forEach((result, index) => {
      console.log(
        `${index + 1}. [${result.score.toFixed(4)}] ${result.title} (${result.category}) - ${result.id}`,
      );
      if (result.tags.length > 0) {
        console.log(`   tags: ${result.tags.join(', ')}`);
      }
      console.log(`   ${result.body}`);
    });
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  Logger.error(
    error instanceof Error ? error.message : String(error),
    error instanceof Error ? error.stack : undefined,
    'SearchContent',
  );
  process.exit(1);
});
