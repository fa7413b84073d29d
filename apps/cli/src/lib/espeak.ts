import { describeError } from "@dubline/core";
import { spawn } from "child_process";
import { once } from "events";
import { finished } from "stream/promises";

export interface EspeakOptions {
  bin: string;
  /** espeak-ng voice, usually a language code such as "en-us" or "km". */
  voice: string;
}

/**
 * Speaks `text` into a WAV file with espeak-ng. The text goes through stdin so
 * that leading dashes are not read as flags.
 */
export const synthesizeWithEspeak = async (
  text: string,
  outputFile: string,
  { bin, voice }: EspeakOptions
): Promise<void> => {
  const args = ["-v", voice, "-w", outputFile, "--stdin"];
  const child = spawn(bin, args, {
    stdio: ["pipe", "ignore", "pipe"],
    shell: false,
  });

  let stderrData = "";
  child.stderr.on("data", (data: Buffer) => {
    stderrData += data.toString("utf8");
  });

  // espeak-ng may exit before reading all of stdin; the write then fails with EPIPE.
  const stdinDone = finished(child.stdin).then(
    () => undefined,
    (error: unknown) => error
  );
  child.stdin.end(text, "utf8");

  const [exitCode] = (await once(child, "exit")) as [
    number | null,
    NodeJS.Signals | null,
  ];
  const stdinError = await stdinDone;

  if (exitCode !== 0) {
    throw new Error(
      `${bin} exited with code ${exitCode}${stderrData ? `: ${stderrData.trim()}` : ""}`
    );
  }
  if (stdinError !== undefined) {
    throw new Error(`Failed to write text to ${bin}: ${describeError(stdinError)}`, {
      cause: stdinError,
    });
  }
};
