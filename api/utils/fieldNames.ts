import { readFile } from "node:fs/promises";
import { parseFieldNames } from "../../src/lib/import/fieldNames";

/** Canonical column names from the reference file; empty when it cannot be read. */
export const loadFieldNames = async (path: string): Promise<string[]> => {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    console.warn("[fields] unreadable", {
      path,
      message: error instanceof Error ? error.message : String(error)
    });
    return [];
  }
  return parseFieldNames(text);
};
