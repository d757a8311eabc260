import {
  BedrockRuntimeClient,
  ConverseCommand,
  type ConverseCommandInput,
  type ConverseCommandOutput,
} from "@aws-sdk/client-bedrock-runtime";
import type { AiSettings } from "./config";
import { AiUnavailableError } from "./errors";
import { logger } from "./logger";

const log = logger.child("ai");

export type Domain = "incidents" | "datasets" | "tickets";

export interface Summarizer {
  readonly enabled: boolean;
  /**
   * Turns a domain aggregate into short, actionable recommendations. An
   * optional analyst question is answered against the same figures.
   * Throws {@link AiUnavailableError} when no model can be reached.
   */
  summarize(domain: Domain, aggregate: unknown, question?: string): Promise<string>;
}

export type ConverseFn = (input: ConverseCommandInput) => Promise<Pick<ConverseCommandOutput, "output">>;

const DOMAIN_PROMPTS: Record<Domain, string> = {
  incidents: `You are a security operations analyst reviewing a summary of cybersecurity incidents.
Focus on open incident volume, the categories driving it and whether high or critical severities are accumulating.
Recommend at most five concrete next steps for the security team, most urgent first.`,
  datasets: `You are a data governance lead reviewing a catalog of uploaded datasets.
Focus on storage growth, which uploaders own most of the data and datasets that look oversized.
Recommend at most five concrete housekeeping or archiving actions, most valuable first.`,
  tickets: `You are an IT service desk manager reviewing a summary of support tickets.
Focus on the open backlog, priority mix and the spread of resolution times between assignees.
Recommend at most five concrete actions to shorten resolution times, most impactful first.`,
};

const RESPONSE_RULES = `Answer in plain text with a short bulleted list. Do not invent figures that are not in the summary.`;

export function buildPrompt(domain: Domain, aggregate: unknown, question?: string): { system: string; user: string } {
  const context = `Current ${domain} summary (JSON):\n${JSON.stringify(aggregate, null, 2)}`;
  const trimmed = question?.trim();
  return {
    system: `${DOMAIN_PROMPTS[domain]}\n\n${RESPONSE_RULES}`,
    user: trimmed ? `${context}\n\nAnalyst question: ${trimmed}` : context,
  };
}

export class DisabledSummarizer implements Summarizer {
  readonly enabled = false;

  async summarize(): Promise<string> {
    throw new AiUnavailableError("AI recommendations are disabled, set AI_ENABLED=true to turn them on");
  }
}

function errorName(err: unknown): string {
  return err instanceof Error ? err.name : "UnknownError";
}

export class BedrockSummarizer implements Summarizer {
  readonly enabled = true;
  private readonly converse: ConverseFn;

  constructor(
    private readonly settings: AiSettings,
    converse?: ConverseFn,
  ) {
    if (converse) {
      this.converse = converse;
    } else {
      const client = new BedrockRuntimeClient({ region: settings.region });
      this.converse = (input) => client.send(new ConverseCommand(input));
    }
  }

  async summarize(domain: Domain, aggregate: unknown, question?: string): Promise<string> {
    const prompt = buildPrompt(domain, aggregate, question);
    const startTime = Date.now();

    let response: Pick<ConverseCommandOutput, "output">;
    try {
      response = await this.converse({
        modelId: this.settings.modelId,
        messages: [{ role: "user", content: [{ text: prompt.user }] }],
        system: [{ text: prompt.system }],
        inferenceConfig: {
          maxTokens: this.settings.maxTokens,
          temperature: this.settings.temperature,
          topP: this.settings.topP,
        },
      });
    } catch (err) {
      const name = errorName(err);
      log.error("Bedrock Converse error", { domain, errorName: name, error: err instanceof Error ? err.message : String(err) });
      if (name === "AccessDeniedException" || name === "UnrecognizedClientException") {
        throw new AiUnavailableError("AWS credentials are invalid or lack Bedrock access");
      }
      if (name === "ResourceNotFoundException" || name === "ModelNotReadyException") {
        throw new AiUnavailableError(`Model ${this.settings.modelId} is not available in region ${this.settings.region}`);
      }
      if (name === "ThrottlingException") {
        throw new AiUnavailableError("Rate limit exceeded on AWS Bedrock, retry after a brief delay");
      }
      throw new AiUnavailableError("AI recommendations are temporarily unavailable");
    }

    const text = (response.output?.message?.content ?? [])
      .map((block) => block.text ?? "")
      .join("")
      .trim();
    if (!text) {
      throw new AiUnavailableError("Empty response from model");
    }
    log.info("Recommendation generated", { domain, modelId: this.settings.modelId, latencyMs: Date.now() - startTime });
    return text;
  }
}

export function createSummarizer(settings: AiSettings, converse?: ConverseFn): Summarizer {
  return settings.enabled ? new BedrockSummarizer(settings, converse) : new DisabledSummarizer();
}

export interface Recommendation<T> {
  summary: T;
  recommendation: string | null;
  /** Set when `recommendation` is null. */
  reason?: string;
}

/** The aggregate is always returned; only the model's text may be missing. */
export async function recommend<T>(
  summarizer: Summarizer,
  domain: Domain,
  summary: T,
  question?: string,
): Promise<Recommendation<T>> {
  try {
    const recommendation = await summarizer.summarize(domain, summary, question);
    return { summary, recommendation };
  } catch (err) {
    if (err instanceof AiUnavailableError) {
      return { summary, recommendation: null, reason: err.message };
    }
    throw err;
  }
}
