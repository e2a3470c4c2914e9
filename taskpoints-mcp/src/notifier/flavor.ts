import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { FlavorSource } from "./types.js";

const QUIPS_FILE = new URL("../../data/quips.json", import.meta.url);

const quipsSchema = z.array(z.string()).min(1);

export function quipSource(
  file: URL | string = QUIPS_FILE,
  random: () => number = Math.random
): FlavorSource {
  return async () => {
    const quips = quipsSchema.parse(JSON.parse(await readFile(file, "utf-8")));
    return quips[Math.floor(random() * quips.length)];
  };
}

export const randomQuip: FlavorSource = quipSource();
