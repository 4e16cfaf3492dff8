import { promises as fs } from "fs";
import { describeError } from "../lib/errors";
import type { AdapterOutput } from "../pipeline";

export async function readTxt(filePath: string): Promise<AdapterOutput> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw new Error(`Input file not readable: ${filePath} (${describeError(error)})`);
  }

  return {
    kind: "text",
    text: buffer.toString("utf-8"),
    meta: {
      sourcePath: filePath,
    },
  };
}
