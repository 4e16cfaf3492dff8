import path from "path";
import { readTxt } from "./txt";
import type { AdapterOutput } from "../pipeline";

export { readTxt } from "./txt";

const SUPPORTED_EXTENSIONS = [".txt", ".text", ".md"] as const;

function isSupported(extension: string): boolean {
  return extension === "" || SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

export async function loadInput(inputPath: string): Promise<AdapterOutput> {
  const extension = path.extname(inputPath).toLowerCase();
  if (isSupported(extension)) {
    return readTxt(inputPath);
  }

  const supportedList = SUPPORTED_EXTENSIONS.join(", ");
  throw new Error(`Unsupported input extension: ${extension}. Supported extensions: ${supportedList}`);
}
