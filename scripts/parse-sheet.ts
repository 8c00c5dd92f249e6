#!/usr/bin/env tsx
/**
 * Print the page/system/measure layout of a MusicXML file
 *
 * Usage:
 *   npx tsx scripts/parse-sheet.ts <input.xml|input.mxl> [--no-validate]
 *
 * Examples:
 *   npx tsx scripts/parse-sheet.ts tests/fixtures/basic.xml
 *   npx tsx scripts/parse-sheet.ts song.mxl --no-validate
 */

import { basename } from 'path';
import { SheetParser } from '../src/parser';
import { fractionToString } from '../src/fraction';
import { FormatError, MalformedInputError, ValidateError } from '../src/errors';

function main() {
  const args = process.argv.slice(2);
  const inputPath = args.find((arg) => !arg.startsWith('--'));

  if (!inputPath) {
    console.log('MusicXML Sheet Layout');
    console.log('');
    console.log('Usage:');
    console.log('  npx tsx scripts/parse-sheet.ts <input.xml|input.mxl> [--no-validate]');
    process.exit(1);
  }

  try {
    const parser = new SheetParser({ validate: !args.includes('--no-validate') });

    console.log(`Parsing: ${basename(inputPath)}`);
    const started = performance.now();
    const sheet = parser.parse(inputPath);
    const elapsed = performance.now() - started;

    console.log(`  Title: ${sheet.title ?? '(untitled)'}`);
    console.log(`  Pages: ${sheet.pages.length}`);
    console.log(`  Measures: ${sheet.measures.length}`);
    for (const warning of sheet.warnings) {
      console.log(`  warning: ${warning.message} at ${warning.path}`);
    }

    for (const page of sheet.pages) {
      console.log(`Page ${page.number} (${page.size.width} x ${page.size.height})`);
      for (const measure of page.measures) {
        const marker = measure.isNewSystem ? '*' : ' ';
        console.log(
          `  ${marker} measure ${measure.number}: x=${measure.x} y=${measure.y} ` +
            `offset=${measure.offset} notes=${measure.notes.length} beams=${measure.beams.length} ` +
            `duration=${fractionToString(measure.duration)}`
        );
      }
    }

    console.log(`Done in ${elapsed.toFixed(1)} ms`);
  } catch (error) {
    if (error instanceof ValidateError) {
      console.error(`Invalid document: ${error.path}`);
      for (const entry of error.errors) {
        console.error(`  [${entry.code}] ${entry.message} at ${entry.path}`);
      }
    } else if (error instanceof FormatError || error instanceof MalformedInputError) {
      console.error('Error:', error.message);
    } else {
      console.error('Error:', error instanceof Error ? error.message : error);
    }
    process.exit(1);
  }
}

main();
