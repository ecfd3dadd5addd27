import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { parseYAML } from "../src/parser/yaml.js";
import type { StorageRepository } from "../src/repository/StorageRepository.js";
import { loadSchemaText } from "../src/schema/SchemaLoader.js";
import type { SchemaModel } from "../src/schema/types.js";
import { fromNative, type Value } from "../src/value/Value.js";

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function readFixture(name: string): string {
  return readFileSync(fixturePath(name), "utf-8");
}

/**
 * The sample backlog: Project / Epic / UserStory / Task plus yearly metrics.
 */
export function projectSchema(): SchemaModel {
  return loadSchemaText(readFixture("project.schema.yaml"));
}

export function projectData(): Value {
  return fromNative(parseYAML({ rawContent: readFixture("project.data.yaml") }));
}

/**
 * The sample data with its YAML text edited first.
 */
export function projectDataWith(edit: (text: string) => string): Value {
  return fromNative(parseYAML({ rawContent: edit(readFixture("project.data.yaml")) }));
}

/**
 * In-memory StorageRepository that counts reads.
 */
export class MemoryRepository implements StorageRepository {
  readonly reads: string[] = [];
  private files: Map<string, string>;

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files));
  }

  write(path: string, content: string): void {
    this.files.set(path, content);
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }

  async readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) throw new Error(`No such file: ${path}`);
    this.reads.push(path);
    return content;
  }
}
