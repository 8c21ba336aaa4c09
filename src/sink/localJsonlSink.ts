import fs from "node:fs";
import path from "node:path";
import { BaseSink } from "./baseSink";
import { SinkPayload, SinkStage } from "./types";

const STAGE_FILES: Record<SinkStage, string> = {
  submitted: "submitted.jsonl",
  download: "downloads.jsonl",
  summary: "summaries.jsonl",
};

export class LocalJsonlSink extends BaseSink {
  private readonly manifestsDir: string;

  constructor(manifestsDir: string, runId: string) {
    super(runId);
    this.manifestsDir = path.resolve(manifestsDir);
    fs.mkdirSync(this.manifestsDir, { recursive: true });
  }

  filePath(stage: SinkStage): string {
    return path.join(this.manifestsDir, STAGE_FILES[stage]);
  }

  protected async publishStage<T extends SinkPayload>(stage: SinkStage, payloads: T[]): Promise<void> {
    if (payloads.length === 0) {
      return;
    }

    const content = payloads.map((payload) => JSON.stringify({ runId: this.runId, ...payload })).join("\n") + "\n";
    await fs.promises.appendFile(this.filePath(stage), content, "utf-8");
  }
}
