#!/usr/bin/env node
// src/cli.ts
// File I/O lives here; the library only ever sees bytes and parsed JSON.
import "dotenv/config";

import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { parseArgs } from "util";

import { runBatch } from "./lib/batch.service";
import { loadConfig, parseConcurrency } from "./lib/config";
import { describeError, type InvoiceError, type Result } from "./lib/errors";
import type { RenderedDocument } from "./lib/invoice-types";
import { createInvoice, createInvoiceFromSheets } from "./lib/invoice.service";
import { parseBatchJob, partySchema, type RawRow } from "./lib/records";

const USAGE = `usage:
  invoicesmith render <invoice.json> [--logo <png|jpg>] [--out <dir>]
  invoicesmith batch <job.json> [--logo <png|jpg>] [--out <dir>] [--files] [--collect] [--concurrency <n>]

invoice.json is either a full invoice record, or { "sheets": { "Invoice_Info": [...], ... }, "from"?: {...} }`;

async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await readFile(file, "utf8"));
}

async function save(dir: string, docs: RenderedDocument[]) {
  await mkdir(dir, { recursive: true });
  for (const d of docs) {
    const target = path.join(dir, d.filename);
    await writeFile(target, d.bytes);
    console.log(`wrote ${target}`);
    for (const w of d.warnings) console.warn(`  warning: ${w}`);
  }
}

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === "object" && v !== null && !Array.isArray(v);

async function main(argv: string[]): Promise<number> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      logo: { type: "string" },
      out: { type: "string", default: "." },
      files: { type: "boolean", default: false },
      collect: { type: "boolean", default: false },
      concurrency: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const [command, input] = positionals;
  if (values.help || !command || !input) {
    console.log(USAGE);
    return values.help ? 0 : 2;
  }

  const config = loadConfig();
  const logo = values.logo ? await readFile(values.logo) : undefined;
  const out = values.out ?? ".";
  const json = await readJson(input);

  if (command === "render") {
    let res: Result<RenderedDocument, InvoiceError>;
    if (isRecord(json) && isRecord(json.sheets)) {
      const sheets: Record<string, RawRow[]> = {};
      for (const [name, rows] of Object.entries(json.sheets)) {
        if (Array.isArray(rows)) sheets[name] = rows.filter(isRecord);
      }
      const from = json.from === undefined ? undefined : partySchema.safeParse(json.from);
      if (from && !from.success) {
        console.error(`invalid "from" party: ${from.error.issues.map((i) => i.message).join("; ")}`);
        return 1;
      }
      res = await createInvoiceFromSheets(sheets, config.style, { from: from?.data, logo });
    } else {
      res = await createInvoice(json, config.style, logo);
    }
    if (!res.ok) {
      console.error(describeError(res.error));
      return 1;
    }
    await save(out, [res.value]);
    return 0;
  }

  if (command === "batch") {
    const job = parseBatchJob(json);
    if (!job.ok) {
      console.error(describeError(job.error));
      return 1;
    }
    const concurrency = values.concurrency === undefined ? config.batch.concurrency : parseConcurrency(values.concurrency);
    if (concurrency === null) {
      console.error(`--concurrency must be a whole number >= 1, got "${values.concurrency}"\n${USAGE}`);
      return 2;
    }
    const result = await runBatch(job.value, config.style, logo, {
      concurrency,
      failureMode: values.collect ? "collect" : config.batch.failureMode,
      delivery: values.files ? "files" : config.batch.delivery,
      onProgress: (p) => console.log(`[batch] ${p.completed}/${p.total}`),
    });
    for (const f of result.failures) console.error(f.message);
    if (result.status === "aborted") return 1;
    await save(out, result.archive ? [result.archive] : result.documents);
    return result.failures.length ? 1 : 0;
  }

  console.error(`unknown command "${command}"\n${USAGE}`);
  return 2;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(e instanceof Error ? e.message : e);
    process.exitCode = 1;
  },
);
