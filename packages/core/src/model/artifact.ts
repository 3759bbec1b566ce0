import { readFile, stat } from "node:fs/promises";
import { basename, resolve } from "node:path";
import { ArtifactError, ExtractionError } from "../errors.js";
import { toFactValue, type FactValue } from "./value.js";

/** One file belonging to a run. The path is checked once, at open time. */
export class Artifact {
  readonly path: string;
  readonly name: string;

  private constructor(path: string) {
    this.path = path;
    this.name = basename(path);
  }

  static async open(path: string): Promise<Artifact> {
    const absPath = resolve(path);
    try {
      await stat(absPath);
    } catch (e) {
      throw new ArtifactError(absPath, "path does not exist", { cause: e });
    }
    return new Artifact(absPath);
  }

  async content(): Promise<Buffer> {
    try {
      return await readFile(this.path);
    } catch (e) {
      throw new ArtifactError(this.path, "unreadable", { cause: e });
    }
  }

  async text(): Promise<string> {
    return (await this.content()).toString("utf-8");
  }

  async json(): Promise<FactValue> {
    const text = await this.text();
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (e) {
      throw new ExtractionError(this.path, "invalid JSON", { cause: e });
    }
    const value = toFactValue(parsed);
    if (value === undefined) {
      throw new ExtractionError(this.path, "JSON holds values that cannot be represented");
    }
    return value;
  }
}
