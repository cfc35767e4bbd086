/**
 * venuelink CLI
 *
 * Joins a restaurant directory export with a hygiene-inspection registry.
 *
 * Commands:
 *   match   - Match one CSV export against the other and write a joined CSV
 *   compare - Compare two names under every scorer
 *   stats   - Summarize a joined CSV written by `match`
 */

import { Command, InvalidArgumentError } from 'commander';
import * as fsPromises from 'fs/promises';
import ora, { type Ora } from 'ora';

import {
  loadMatchConfigFile,
  resolveMatchConfig,
  type MatchConfig,
  type MatchConfigInput,
} from './config.js';
import {
  formatJoinedCsv,
  parseCsv,
  readInspectionsCsv,
  readPlacesCsv,
  type LoadedVenues,
  type VenueKind,
} from './csv-io.js';
import { matchAllAsync, type MatchAllAsyncOptions, type MatchResult } from './matcher.js';
import { normalizeName } from './normalize.js';
import type { VenueRecord } from './records.js';
import {
  DEFAULT_HIGH_CONFIDENCE_SCORE,
  formatSummary,
  summarizeJoinedRows,
  summarizeMatches,
} from './summary.js';
import { NAME_SCORER_NAMES, scoreWithAllScorers, type NameScorer } from './token-ratio.js';

// ============================================================================
// VERSION
// ============================================================================

const VERSION = '0.1.0';

// ============================================================================
// OPTION PARSERS
// ============================================================================

type ProbeSide = 'places' | 'inspections';

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseProbeSide(value: string): ProbeSide {
  if (value === 'places' || value === 'inspections') return value;
  throw new InvalidArgumentError('Expected "places" or "inspections".');
}

function parseNameScorer(value: string): NameScorer {
  const scorer = NAME_SCORER_NAMES.find((name) => name === value);
  if (!scorer) {
    throw new InvalidArgumentError(`Expected one of: ${NAME_SCORER_NAMES.join(', ')}.`);
  }
  return scorer;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// MATCH COMMAND
// ============================================================================

interface MatchCommandOptions {
  output?: string;
  probe: ProbeSide;
  maxDistance?: number;
  minScore?: number;
  nameScorer?: NameScorer;
  minNameScore?: number;
  config?: string;
  summary?: boolean;
  quiet?: boolean;
}

async function buildConfig(options: MatchCommandOptions): Promise<MatchConfig> {
  const base: MatchConfigInput = options.config ? await loadMatchConfigFile(options.config) : {};

  return resolveMatchConfig({
    ...base,
    maxDistanceMeters: options.maxDistance ?? base.maxDistanceMeters,
    minMatchScore: options.minScore ?? base.minMatchScore,
    nameScorer: options.nameScorer ?? base.nameScorer,
    minNameScore: options.minNameScore ?? base.minNameScore,
  });
}

function warnDuplicates(label: string, loaded: LoadedVenues<VenueRecord>): void {
  if (loaded.duplicateIds.length === 0) return;
  console.warn(`Skipped ${loaded.duplicateIds.length} duplicate ${label} id(s)`);
}

function createMatchCommand(): Command {
  return new Command('match')
    .description('Match places against inspections and write a joined CSV')
    .argument('<places>', 'Places directory CSV export')
    .argument('<inspections>', 'Hygiene inspection registry CSV export')
    .option('-o, --output <file>', 'Output file (defaults to stdout)')
    .option('--probe <side>', 'Which export is matched: places or inspections', parseProbeSide, 'places')
    .option('-d, --max-distance <meters>', 'Hard distance cutoff in meters', parseNumber)
    .option('-s, --min-score <score>', 'Minimum combined score to accept (0-1)', parseNumber)
    .option('--name-scorer <scorer>', `Name scorer: ${NAME_SCORER_NAMES.join(', ')}`, parseNameScorer)
    .option('--min-name-score <score>', 'Skip candidates whose name score is lower (0-1)', parseNumber)
    .option('-c, --config <file>', 'JSON file with match configuration')
    .option('--summary', 'Print match rate to stderr when done')
    .option('-q, --quiet', 'Suppress progress output')
    .action(async (placesFile: string, inspectionsFile: string, options: MatchCommandOptions) => {
      let spinner: Ora | null = null;

      try {
        // Configuration problems surface before any file is read
        const config = await buildConfig(options);

        spinner = options.quiet ? null : ora('Loading exports...').start();
        const [places, inspections] = await Promise.all([
          readPlacesCsv(placesFile),
          readInspectionsCsv(inspectionsFile),
        ]);

        if (!options.quiet) {
          warnDuplicates('place', places);
          warnDuplicates('inspection', inspections);
        }

        const probeKind: VenueKind = options.probe === 'inspections' ? 'inspection' : 'place';
        const candidateKind: VenueKind = probeKind === 'place' ? 'inspection' : 'place';
        const probeCount = probeKind === 'place' ? places.records.length : inspections.records.length;
        const candidateCount = probeKind === 'place' ? inspections.records.length : places.records.length;

        if (spinner) spinner.text = `Matching ${probeCount} ${options.probe} against ${candidateCount} candidates...`;

        const asyncOptions: MatchAllAsyncOptions = {
          onProgress: ({ done, total, matched }) => {
            if (spinner) spinner.text = `Matched ${matched} of ${done}/${total}...`;
          },
        };

        const results: MatchResult[] =
          probeKind === 'place'
            ? await matchAllAsync(places.records, inspections.records, config, asyncOptions)
            : await matchAllAsync(inspections.records, places.records, config, asyncOptions);

        const summary = summarizeMatches(results);
        if (spinner) spinner.succeed(`Matched ${summary.matched} of ${summary.total} ${options.probe}`);

        const probeSide = probeKind === 'place' ? places : inspections;
        const candidateSide = probeKind === 'place' ? inspections : places;
        const output = formatJoinedCsv(results, probeKind, candidateKind, {
          probeColumns: probeSide.columns,
          candidateColumns: candidateSide.columns,
        });

        if (options.output) {
          await fsPromises.writeFile(options.output, output);
          if (!options.quiet) {
            console.log(`Output written to ${options.output}`);
          }
        } else {
          console.log(output.trimEnd());
        }

        if (options.summary) {
          for (const line of formatSummary(summary, options.probe)) {
            console.error(line);
          }
        }
      } catch (error) {
        if (spinner) spinner.fail('Match failed');
        console.error(errorMessage(error));
        process.exitCode = 1;
      }
    });
}

// ============================================================================
// COMPARE COMMAND
// ============================================================================

function createCompareCommand(): Command {
  return new Command('compare')
    .description('Compare two names and show every similarity score')
    .argument('<name1>', 'First name')
    .argument('<name2>', 'Second name')
    .action((name1: string, name2: string) => {
      const key1 = normalizeName(name1);
      const key2 = normalizeName(name2);
      const scores = scoreWithAllScorers(key1, key2);

      console.log('\n=== Name Comparison ===\n');
      console.log(`Original 1:   "${name1}"`);
      console.log(`Original 2:   "${name2}"`);
      console.log(`Normalized 1: "${key1}"`);
      console.log(`Normalized 2: "${key2}"`);

      console.log('\n=== Similarity Scores ===\n');
      const width = Math.max(...NAME_SCORER_NAMES.map((name) => name.length));
      for (const scorer of NAME_SCORER_NAMES) {
        console.log(`${`${scorer}:`.padEnd(width + 2)}${(scores[scorer] * 100).toFixed(1)}%`);
      }
      console.log('');
    });
}

// ============================================================================
// STATS COMMAND
// ============================================================================

interface StatsCommandOptions {
  highConfidence: number;
}

function createStatsCommand(): Command {
  return new Command('stats')
    .description('Summarize a joined CSV written by the match command')
    .argument('<joined>', 'Joined CSV file')
    .option(
      '--high-confidence <score>',
      'Score at or above which a match is high confidence',
      parseNumber,
      DEFAULT_HIGH_CONFIDENCE_SCORE
    )
    .action(async (joinedFile: string, options: StatsCommandOptions) => {
      try {
        const content = await fsPromises.readFile(joinedFile, 'utf-8');
        const summary = summarizeJoinedRows(parseCsv(content), {
          highConfidenceScore: options.highConfidence,
        });

        for (const line of formatSummary(summary, 'rows')) {
          console.log(line);
        }
      } catch (error) {
        console.error(errorMessage(error));
        process.exitCode = 1;
      }
    });
}

// ============================================================================
// MAIN PROGRAM
// ============================================================================

export function createProgram(): Command {
  const program = new Command()
    .name('venuelink')
    .description('Record linkage between a restaurant directory and hygiene inspections')
    .version(VERSION);

  program.addCommand(createMatchCommand());
  program.addCommand(createCompareCommand());
  program.addCommand(createStatsCommand());

  return program;
}
