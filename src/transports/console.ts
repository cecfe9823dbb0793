import type { AnalysisResult, EntityCategory, ResultTransport } from "../types.js";
import { formatAnalysis } from "./format.js";

export type OutputWriter = (text: string) => void;

export class ConsoleTransport implements ResultTransport {
  readonly name = "console";
  private readonly write: OutputWriter;

  constructor(write: OutputWriter = (text) => process.stdout.write(text)) {
    this.write = write;
  }

  async sendAnalysis(result: AnalysisResult): Promise<void> {
    this.write(`${formatAnalysis(result)}\n`);
  }

  async sendValues(_category: EntityCategory | null, values: readonly string[]): Promise<void> {
    this.write(values.length > 0 ? `${values.join("\n")}\n` : "");
  }
}
