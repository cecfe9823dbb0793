import type { AnalysisResult, EntityCategory, ResultTransport } from "../types.js";
import type { OutputWriter } from "./console.js";

export class JsonTransport implements ResultTransport {
  readonly name = "json";
  private readonly write: OutputWriter;

  constructor(write: OutputWriter = (text) => process.stdout.write(text)) {
    this.write = write;
  }

  async sendAnalysis(result: AnalysisResult): Promise<void> {
    this.write(`${JSON.stringify(result, null, 2)}\n`);
  }

  async sendValues(category: EntityCategory | null, values: readonly string[]): Promise<void> {
    this.write(`${JSON.stringify(category ? { category, values } : { categories: values })}\n`);
  }
}
