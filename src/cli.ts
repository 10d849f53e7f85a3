#!/usr/bin/env node
import { createInterface, type Interface } from "node:readline/promises";
import { Command, InvalidArgumentError } from "commander";
import { loadCatalog } from "./catalog";
import { loadConfig } from "./config";
import { CatalogError, SessionAbortedError } from "./errors";
import { logError, setLogEnabled } from "./log";
import { banner, createStyler, formatLoadSummary, type Styler } from "./presenter";
import { listGenres } from "./recommend";
import { runSession, type Prompter } from "./session";
import type { CatalogLoadResult } from "./types";

type CliOptions = {
  catalog?: string;
  delimiter?: string;
  limit?: number;
  color: boolean;
};

class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly closed: Promise<null>;
  private isClosed = false;

  constructor() {
    this.rl = createInterface({ input: process.stdin, output: process.stdout });
    this.closed = new Promise((resolve) => {
      this.rl.once("close", () => {
        this.isClosed = true;
        resolve(null);
      });
    });
  }

  async ask(question: string): Promise<string | null> {
    if (this.isClosed) return null;
    return Promise.race([this.rl.question(question), this.closed]);
  }

  close(): void {
    this.rl.close();
  }
}

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Limit must be a positive whole number.");
  }
  return n;
}

function parseDelimiter(value: string): string {
  if (value.length !== 1) {
    throw new InvalidArgumentError("Delimiter must be a single character.");
  }
  return value;
}

let style: Styler = createStyler(!process.env.NO_COLOR);

async function prepare(opts: CliOptions): Promise<{ result: CatalogLoadResult; limit: number }> {
  const config = loadConfig();
  setLogEnabled(config.logEvents);
  style = createStyler(opts.color && config.color);

  const result = await loadCatalog(opts.catalog ?? config.catalogPath, {
    delimiter: opts.delimiter ?? config.catalogDelimiter
  });
  return { result, limit: opts.limit ?? config.recommendLimit };
}

const program = new Command();

program
  .name("dj-next")
  .description("Suggest the next track from a song catalog by tempo, energy and genre")
  .option("-c, --catalog <path>", "catalog file (default: CATALOG_PATH or ./catalog/songs.csv)")
  .option("-d, --delimiter <char>", "field delimiter", parseDelimiter)
  .option("-n, --limit <count>", "number of recommendations", parseLimit)
  .option("--no-color", "disable coloured output")
  .action(async () => {
    const { result, limit } = await prepare(program.opts<CliOptions>());
    for (const line of banner(style)) console.log(line);
    for (const line of formatLoadSummary(result.loadedCount, result.skippedCount, style)) console.log(line);

    const prompter = new ReadlinePrompter();
    try {
      await runSession(result.catalog, { prompter, write: (line) => console.log(line), style }, { limit });
    } finally {
      prompter.close();
    }
    console.log(style("\nDone. Run again to try a different song.\n", "cyan"));
  });

program
  .command("genres")
  .description("list the genres found in the catalog")
  .action(async () => {
    const { result } = await prepare(program.opts<CliOptions>());
    for (const genre of listGenres(result.catalog)) console.log(genre);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof SessionAbortedError) {
    return;
  }
  if (error instanceof CatalogError) {
    console.error(style(`Error: ${error.message}`, "red"));
    logError("catalog.error", error, { code: error.code, path: error.path });
  } else {
    console.error(style(`Error: ${error instanceof Error ? error.message : String(error)}`, "red"));
    logError("cli.error", error);
  }
  process.exitCode = 1;
});
