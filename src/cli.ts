#!/usr/bin/env node
/**
 * exif-carry CLI: copy Exif metadata from an original JPEG onto a
 * recompressed copy, or inspect image headers.
 *
 *  • exif-carry original.jpg small.jpg            → small-exif.jpg
 *  • exif-carry original.jpg small.jpg -i         → overwrite small.jpg
 *  • cat small.jpg | exif-carry original.jpg -    → stdout
 *  • exif-carry --inspect a.jpg b.png             → type, alpha, Exif, orientation
 */

import { readFileSync, realpathSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { dirname, join, resolve } from 'node:path';
import { cloneExifFile, readHeaderFile, readStreamToBytes, spliceJpegExif } from './node.js';
import { describeOrientation } from './exif/orientation.js';
import type { CloneFileOptions, HeaderInfo } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// ─── Helpers ──────────────────────────────────────────────────────────────────

function getVersion(): string {
  const pkgPath = join(__dirname, '..', 'package.json');
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

function formatSize(bytes: number): string {
  if (bytes >= 1_000_000) return `${(bytes / 1_000_000).toFixed(1)} MB`;
  if (bytes >= 1_000) return `${(bytes / 1_000).toFixed(1)} KB`;
  return `${bytes} B`;
}

export function formatHeader(info: HeaderInfo): string {
  const lines: string[] = [];

  lines.push(`  Type      : ${info.type}`);
  lines.push(`  MIME      : ${info.mimeType}`);
  lines.push(`  Alpha     : ${info.hasAlpha ? 'yes' : 'no'}`);
  if (info.exifBlock && info.exifStartOffset !== null) {
    lines.push(`  Exif      : ${formatSize(info.exifBlock.length)} at offset ${info.exifStartOffset}`);
  } else {
    lines.push('  Exif      : none');
  }
  const transform = describeOrientation(info.orientation);
  if (transform) {
    const mirror = transform.mirrored ? ', mirrored' : '';
    lines.push(`  Orient.   : ${info.orientation} (rotate ${transform.rotation}°${mirror})`);
  } else if (info.orientation !== -1) {
    lines.push(`  Orient.   : ${info.orientation}`);
  }

  return lines.join('\n');
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ─── Help text ────────────────────────────────────────────────────────────────

const HELP = `
exif-carry <source.jpg> <dest.jpg> [options]
exif-carry --inspect <file...>

Copy the Exif segment of a source JPEG into a destination JPEG.

OPTIONS
  -i, --in-place              Overwrite the destination file
  -o, --output <path>         Output file
  -s, --suffix <suffix>       Output suffix (default: "-exif")
      --strict                Fail when the source has no Exif segment
      --inspect               Show image type, Exif block and orientation
  -q, --quiet                 Suppress output
  -h, --help                  Show this help
  -v, --version               Show version

STDIN / STDOUT
  Pass '-' as the destination to read it from stdin and write to stdout.
  -i, -o, -s and -q do not apply in this mode; --strict does.
  Example:  cat small.jpg | exif-carry original.jpg - > small-exif.jpg

ENVIRONMENT
  EXIF_CARRY_LOG_LEVEL        pino log level for parser diagnostics (default: info)
`.trim();

// ─── Argument parser ──────────────────────────────────────────────────────────

export interface CliArgs {
  files: string[];
  inPlace: boolean;
  outputPath?: string;
  suffix?: string;
  strict: boolean;
  inspect: boolean;
  quiet: boolean;
}

export function parseArgs(raw: string[]): CliArgs {
  const args: CliArgs = {
    files: [],
    inPlace: false,
    strict: false,
    inspect: false,
    quiet: false,
  };

  const take = (i: number, flag: string): [number, string] => {
    const val = raw[i + 1];
    if (val === undefined || (val.startsWith('-') && val !== '-')) {
      throw new UsageError(`${flag} requires a value`);
    }
    return [i + 1, val];
  };

  for (let i = 0; i < raw.length; i++) {
    const a = raw[i]!;
    switch (a) {
      case '-i': case '--in-place':  args.inPlace = true; break;
      case '-q': case '--quiet':     args.quiet = true; break;
      case '--strict':               args.strict = true; break;
      case '--inspect':              args.inspect = true; break;

      case '-o': case '--output': {
        const [ni, v] = take(i, a); i = ni; args.outputPath = v; break;
      }
      case '-s': case '--suffix': {
        const [ni, v] = take(i, a); i = ni; args.suffix = v; break;
      }
      default:
        if (a.startsWith('-') && a !== '-') {
          throw new UsageError(`Unknown option: ${a}`);
        }
        args.files.push(a);
    }
  }

  if (args.files[1] === '-' && (args.inPlace || args.quiet || args.outputPath !== undefined || args.suffix !== undefined)) {
    throw new UsageError('-i, -o, -s and -q cannot be used with a - destination');
  }

  return args;
}

function buildOptions(a: CliArgs): CloneFileOptions {
  return {
    inPlace: a.inPlace,
    strict: a.strict,
    ...(a.suffix !== undefined     && { suffix: a.suffix }),
    ...(a.outputPath !== undefined && { outputPath: a.outputPath }),
  };
}

// ─── Stdin → Stdout ───────────────────────────────────────────────────────────

/**
 * Where stdin mode reads the destination from and writes the result to
 */
export interface CliStreams {
  stdin: AsyncIterable<Uint8Array | string>;
  stdout: { write(chunk: Uint8Array): unknown };
}

async function processStdin(sourcePath: string, strict: boolean, io: CliStreams): Promise<void> {
  const absSource = resolve(sourcePath);
  const src = new Uint8Array(await readFile(absSource));
  const dest = await readStreamToBytes(io.stdin);
  const { output } = spliceJpegExif(src, dest, { strict, sourceName: absSource });
  io.stdout.write(output);
}

// ─── Main ─────────────────────────────────────────────────────────────────────

/**
 * Run the CLI and resolve with the process exit code
 */
export async function main(
  rawArgs: string[],
  io: CliStreams = { stdin: process.stdin, stdout: process.stdout },
): Promise<number> {
  if (rawArgs.length === 0 || rawArgs.includes('-h') || rawArgs.includes('--help')) {
    console.log(HELP);
    return 0;
  }
  if (rawArgs.includes('-v') || rawArgs.includes('--version')) {
    console.log(getVersion());
    return 0;
  }

  let a: CliArgs;
  try {
    a = parseArgs(rawArgs);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  // ── Inspect mode ──
  if (a.inspect) {
    if (a.files.length === 0) {
      console.error('Error: --inspect needs at least one file');
      return 1;
    }
    let hasError = false;
    for (const f of a.files) {
      try {
        const info = readHeaderFile(f);
        console.log(`\n${f}`);
        console.log(formatHeader(info));
      } catch (err) {
        console.error(`✗ ${f}: ${err instanceof Error ? err.message : String(err)}`);
        hasError = true;
      }
    }
    return hasError ? 1 : 0;
  }

  const [source, dest, ...extra] = a.files;
  if (source === undefined || dest === undefined || extra.length > 0) {
    console.error('Error: expected exactly one source and one destination file');
    return 1;
  }

  // ── Stdin → stdout ──
  if (dest === '-') {
    try {
      await processStdin(source, a.strict, io);
    } catch (err) {
      console.error(`✗ stdin: ${err instanceof Error ? err.message : String(err)}`);
      return 1;
    }
    return 0;
  }

  try {
    const result = await cloneExifFile(source, dest, buildOptions(a));
    if (!a.quiet) {
      const exifDesc = result.sourceExifSize > 0
        ? `Exif ${formatSize(result.sourceExifSize)}`
        : 'no Exif in source';
      const sizeDesc = `${formatSize(result.originalSize)} → ${formatSize(result.outputSize)}`;
      console.log(`  ✓ ${dest} → ${result.outputPath} (${exifDesc} | ${sizeDesc})`);
    }
    return 0;
  } catch (err) {
    console.error(`  ✗ ${dest}: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

// ─── Entry ────────────────────────────────────────────────────────────────────

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  try {
    return realpathSync(entry) === realpathSync(__filename);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
}
