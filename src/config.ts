import * as os from "os";
import { DEFAULT_DESTINATION_DIR, DEFAULT_TIMEOUT } from "./core/crawler";
import { ConfigError } from "./core/errors";
import { CrawlConfig } from "./types";

export const DEFAULT_DEPTH = 3;

export const USAGE = `Usage: crawl --url=<start-url> [options]

Options:
  --url=<url>          Starting URL to crawl (required)
  --dir=<path>         Destination directory for downloaded pages (default: ${DEFAULT_DESTINATION_DIR})
  --depth=<n>          Maximum crawl depth (default: ${DEFAULT_DEPTH})
  --concurrency=<n>    Pages fetched in parallel (default: number of CPUs)
  --timeout=<ms>       Request timeout in milliseconds (default: ${DEFAULT_TIMEOUT})`;

/**
 * Split argv into a flag map. Accepts both `--key=value` and `--key value`.
 */
function readFlags(argv: string[]): Record<string, string> {
  const opts: Record<string, string> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) continue;

    const eqIdx = arg.indexOf("=");
    if (eqIdx !== -1) {
      opts[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      continue;
    }

    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      opts[arg.slice(2)] = next;
      i++;
    } else {
      opts[arg.slice(2)] = "";
    }
  }

  return opts;
}

function parseInteger(name: string, value: string | undefined, fallback: number, min: number): number {
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`--${name} must be a whole number, got "${value}"`);
  }
  const parsed = parseInt(value, 10);
  if (parsed < min) {
    throw new ConfigError(`--${name} must be at least ${min}, got ${parsed}`);
  }
  return parsed;
}

function parseStartUrl(value: string | undefined): string {
  if (!value) throw new ConfigError("--url is required");

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError(`invalid URL: ${value}`);
  }
  if ((url.protocol !== "http:" && url.protocol !== "https:") || !url.host) {
    throw new ConfigError("URL must include an http(s) scheme and host (e.g., https://example.com)");
  }
  return value;
}

/**
 * Parse CLI arguments into a CrawlConfig.
 * @param argv - Arguments after the script name
 * @throws ConfigError on a missing or malformed value
 */
export function parseArgs(argv: string[]): CrawlConfig {
  const opts = readFlags(argv);

  return {
    startUrl: parseStartUrl(opts.url),
    destinationDir: opts.dir || DEFAULT_DESTINATION_DIR,
    depth: parseInteger("depth", opts.depth, DEFAULT_DEPTH, 0),
    concurrency: parseInteger("concurrency", opts.concurrency, os.availableParallelism(), 1),
    timeout: parseInteger("timeout", opts.timeout, DEFAULT_TIMEOUT, 1),
  };
}
