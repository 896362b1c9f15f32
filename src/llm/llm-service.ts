import OpenAI from "openai";
import fs from "fs";
import path from "path";
import { logger } from "../utils/logger";

export interface CompletionRequest {
  /** Short label used in logs and interaction file names, e.g. "GAPS". */
  tag: string;
  systemPrompt: string;
  userPrompt: string;
}

/**
 * What the analyst needs from a language model: a prompt in, free text out.
 */
export interface CompletionClient {
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}

/** The part of the OpenAI client this service calls. */
export interface ChatClient {
  chat: {
    completions: {
      create(body: OpenAI.ChatCompletionCreateParamsNonStreaming): PromiseLike<OpenAI.ChatCompletion>;
    };
  };
  models: { list(): PromiseLike<unknown> };
}

export interface LLMServiceOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature?: number;
  logInteractions?: boolean;
  /** Where interaction logs go; defaults to ./output/chat */
  interactionLogDir?: string;
  /** Defaults to an OpenAI client built from apiKey and baseUrl. */
  client?: ChatClient;
}

interface TokenUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export class LLMService implements CompletionClient {
  public readonly model: string;
  private openai: ChatClient;
  private temperature: number | undefined;
  private logInteractions: boolean;
  private interactionLogDir: string;

  constructor(options: LLMServiceOptions) {
    this.openai =
      options.client ??
      new OpenAI({
        baseURL: options.baseUrl,
        apiKey: options.apiKey,
      });
    this.model = options.model;
    this.temperature = options.temperature;
    this.logInteractions = options.logInteractions ?? false;
    this.interactionLogDir =
      options.interactionLogDir ?? path.resolve(process.cwd(), "output", "chat");
  }

  /**
   * Lists the models on the endpoint as a connectivity check.
   */
  public async testConnection(): Promise<boolean> {
    try {
      logger.info(`[LLM] Probando conexión (${this.model})...`);
      await this.openai.models.list();
      logger.info("[LLM] Conexión exitosa");
      return true;
    } catch (error) {
      logger.error("[LLM] Falló la conexión", error);
      return false;
    }
  }

  public async complete(request: CompletionRequest): Promise<string> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: request.systemPrompt },
        { role: "user", content: request.userPrompt },
      ],
      temperature: this.temperature,
    });

    this.logTokenUsage(request.tag, response.usage);

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new Error(`El modelo devolvió una respuesta vacía (${request.tag})`);
    }

    await this.saveInteractionLog(request, content);
    return content;
  }

  private logTokenUsage(tag: string, usage: TokenUsage | undefined) {
    if (!usage) return;
    const promptK = (usage.prompt_tokens / 1000).toFixed(3);
    const completionK = (usage.completion_tokens / 1000).toFixed(3);
    const totalK = (usage.total_tokens / 1000).toFixed(3);
    logger.info(
      `[LLM] [${tag}] Tokens entrada: ${promptK}k | salida: ${completionK}k | total: ${totalK}k`
    );
  }

  private async saveInteractionLog(request: CompletionRequest, response: string) {
    if (!this.logInteractions) return;

    try {
      const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
      await fs.promises.mkdir(this.interactionLogDir, { recursive: true });

      const filePath = path.join(this.interactionLogDir, `${timestamp}_${request.tag}.md`);
      const content = `# LLM Interaction Log - ${request.tag}
Date: ${new Date().toLocaleString()}
Model: ${this.model}

## System Prompt
\`\`\`text
${request.systemPrompt}
\`\`\`

## User Prompt
\`\`\`text
${request.userPrompt}
\`\`\`

## Response
\`\`\`markdown
${response}
\`\`\`
`;

      await fs.promises.writeFile(filePath, content, "utf-8");
      logger.info(`[LLM] Interacción guardada: ${filePath}`);
    } catch (error) {
      // Diagnostics only; the completion is still returned
      logger.error("[LLM] No se pudo guardar el log de interacción", error);
    }
  }
}
