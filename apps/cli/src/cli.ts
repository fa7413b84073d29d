#!/usr/bin/env tsx
import "dotenv/config";
import { parseSrtDetailed, type TaskOutcome } from "@dubline/core";
import fs from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import { loadConfig } from "./config";
import { parseVoiceSelection } from "./lib/voices";
import { createGenerateVoiceTask } from "./tools/generate-voice";
import { attachConsoleReporter } from "./tools/report";
import { createTranslateVideoTask } from "./tools/translate-video";
import { writeJSON } from "./utils/file";

const USAGE = `Usage:
  dubline translate <media> --out <file.srt> --lang <code> [--source-lang <code>] [--model <id>] [--report <file.json>]
  dubline voice <file.srt> --out <file.mp3|file.wav> --lang <code> [--voice openai:alloy|espeak[:voice]] [--report <file.json>]
  dubline check <file.srt>`;

const languageCode = z.string().trim().min(2, "--lang must be a language code");

const translateArgs = z.object({
  input: z.string().min(1, "missing <media> argument"),
  out: z.string().min(1, "--out is required"),
  lang: languageCode,
  "source-lang": z.string().trim().min(2).optional(),
  model: z.string().min(1).optional(),
  report: z.string().min(1).optional(),
});

const voiceArgs = z.object({
  input: z.string().min(1, "missing <file.srt> argument"),
  out: z.string().min(1, "--out is required"),
  lang: languageCode,
  voice: z.string().default("openai:alloy"),
  report: z.string().min(1).optional(),
});

const checkArgs = z.object({
  input: z.string().min(1, "missing <file.srt> argument"),
});

const finish = async <T>(outcome: TaskOutcome<T>, reportPath?: string) => {
  if (reportPath) {
    await writeJSON(reportPath, outcome);
    console.log(`Report saved to ${reportPath}`);
  }
  if (!outcome.ok) {
    process.exitCode = 1;
  }
};

const translate = async (options: z.infer<typeof translateArgs>) => {
  const task = createTranslateVideoTask({
    mediaPath: options.input,
    destinationPath: options.out,
    targetLanguage: options.lang,
    sourceLanguage: options["source-lang"],
    translationModel: options.model,
  });
  const detach = attachConsoleReporter(task);
  task.onSuccess(({ segments, fallbackCount }) => {
    console.log(
      `Done: ${segments.length} segments, ${fallbackCount} kept in the source language.`
    );
  });

  const outcome = await task.run();
  detach();
  await finish(outcome, options.report);
};

const voice = async (options: z.infer<typeof voiceArgs>) => {
  const task = createGenerateVoiceTask(
    {
      subtitlePath: options.input,
      destinationPath: options.out,
      targetLanguage: options.lang,
      voice: parseVoiceSelection(options.voice),
    },
    loadConfig()
  );
  const detach = attachConsoleReporter(task);
  task.onSuccess((result) => {
    if (result.kind === "written") {
      console.log(
        `Done: ${result.duration.toFixed(3)}s of audio, drift ${result.drift.toFixed(3)}s, ${result.skipped.length} segments skipped.`
      );
    }
  });

  const outcome = await task.run();
  detach();
  await finish(outcome, options.report);
};

const check = async ({ input }: z.infer<typeof checkArgs>) => {
  const { segments, skipped } = parseSrtDetailed(await fs.readFile(input, "utf8"));
  console.log(`${path.basename(input)}: ${segments.length} segments`);
  for (const { block, reason } of skipped) {
    console.warn(`  block ${block} skipped: ${reason}`);
  }
  const last = segments.at(-1);
  if (last) {
    console.log(`  ends at ${last.end.toFixed(3)}s`);
  }
};

async function main() {
  const { positionals, values } = parseArgs({
    allowPositionals: true,
    options: {
      out: { type: "string", short: "o" },
      lang: { type: "string", short: "l" },
      "source-lang": { type: "string" },
      model: { type: "string" },
      voice: { type: "string" },
      report: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
  const [command, input = ""] = positionals;

  if (values.help || !command) {
    console.log(USAGE);
    return;
  }

  switch (command) {
    case "translate":
      await translate(translateArgs.parse({ ...values, input }));
      break;
    case "voice":
      await voice(voiceArgs.parse({ ...values, input }));
      break;
    case "check":
      await check(checkArgs.parse({ input }));
      break;
    default:
      console.error(`Unknown command "${command}".\n\n${USAGE}`);
      process.exitCode = 1;
  }
}

main().catch((error) => {
  if (error instanceof z.ZodError) {
    console.error(error.issues.map((issue) => issue.message).join("\n"));
    console.error(`\n${USAGE}`);
  } else {
    console.error("Error in CLI:", error);
  }
  process.exit(1);
});
