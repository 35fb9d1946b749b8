import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname, normalize } from "node:path";
import { parse, stringify } from "yaml";

/** Parsed YAML document, or null when the file does not exist. */
export async function readYamlFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
  if (!content.trim()) return null;
  return parse(content);
}

export async function writeYamlFile(path: string, data: unknown): Promise<void> {
  await ensureFolder(dirname(path));
  await writeFile(path, stringify(data), "utf8");
}

export async function ensureFolder(dir: string): Promise<void> {
  const normalised = normalize(dir);
  if (!normalised.length || normalised === ".") return;
  const existing = await statOrNull(normalised);
  if (existing && !existing.isDirectory()) {
    throw new Error(`Cannot create folder '${dir}': a file already exists at this path.`);
  }
  if (!existing) {
    await mkdir(normalised, { recursive: true });
  }
}

/** Creates the file with `content` unless it exists; folders are made as needed. */
export async function ensureFile(path: string, content: string): Promise<void> {
  const np = normalize(path);
  await ensureFolder(dirname(np));
  const existing = await statOrNull(np);
  if (existing?.isFile()) return;
  if (existing?.isDirectory()) {
    throw new Error(`Cannot create file '${np}': a folder already exists at this path.`);
  }
  await writeFile(np, content, "utf8");
}

async function statOrNull(path: string) {
  try {
    return await stat(path);
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
