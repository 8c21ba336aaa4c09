import { AppConfig } from "../config";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { RabbitSink } from "./rabbitSink";
import { SqsSink } from "./sqsSink";
import { Sink } from "./types";

export function createSink(config: AppConfig, runId: string, env: NodeJS.ProcessEnv = process.env): Sink {
  const sinkType = (env.SINK_TYPE ?? "local_jsonl").toLowerCase();

  switch (sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config.manifestsDir, runId);
    case "sqs":
      return new SqsSink({ queueUrl: env.SQS_QUEUE_URL, runId });
    case "rabbit":
      return new RabbitSink({ connectionUrl: env.RABBIT_URL, runId });
    case "http":
      return new HttpSink({ endpoint: env.HTTP_SINK_ENDPOINT, token: env.HTTP_SINK_TOKEN, runId });
    default:
      throw new Error(`Unsupported sink type: ${sinkType}`);
  }
}

export * from "./baseSink";
export * from "./httpSink";
export * from "./localJsonlSink";
export * from "./rabbitSink";
export * from "./records";
export * from "./sqsSink";
export * from "./types";
