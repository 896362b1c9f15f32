import fs from "fs";
import os from "os";
import path from "path";
import type OpenAI from "openai";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type ChatClient, LLMService } from "./llm-service";

function completion(content: string | null): OpenAI.ChatCompletion {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 1760000000,
    model: "test-model",
    usage: { prompt_tokens: 1200, completion_tokens: 300, total_tokens: 1500 },
    choices: [
      {
        index: 0,
        finish_reason: "stop",
        logprobs: null,
        message: { role: "assistant", content, refusal: null },
      },
    ],
  };
}

class FakeChatClient implements ChatClient {
  public requests: OpenAI.ChatCompletionCreateParamsNonStreaming[] = [];
  public modelsError: Error | null = null;

  constructor(private content: string | null) {}

  chat = {
    completions: {
      create: async (body: OpenAI.ChatCompletionCreateParamsNonStreaming) => {
        this.requests.push(body);
        return completion(this.content);
      },
    },
  };

  models = {
    list: async () => {
      if (this.modelsError) throw this.modelsError;
      return { data: [] };
    },
  };
}

const REQUEST = { tag: "GAPS", systemPrompt: "Sos analista.", userPrompt: "Brechas del día" };

describe("LLMService", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "llm-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function service(client: ChatClient, logInteractions: boolean, interactionLogDir = dir) {
    return new LLMService({
      apiKey: "test-secret",
      baseUrl: "http://localhost:0/v1",
      model: "test-model",
      temperature: 0.3,
      logInteractions,
      interactionLogDir,
      client,
    });
  }

  it("returns the trimmed content and sends both prompts", async () => {
    const client = new FakeChatClient("  La brecha se amplió.\n");

    await expect(service(client, false).complete(REQUEST)).resolves.toBe("La brecha se amplió.");
    expect(client.requests).toHaveLength(1);
    expect(client.requests[0].model).toBe("test-model");
    expect(client.requests[0].temperature).toBe(0.3);
    expect(client.requests[0].messages).toEqual([
      { role: "system", content: "Sos analista." },
      { role: "user", content: "Brechas del día" },
    ]);
  });

  it("rejects blank or missing content", async () => {
    await expect(service(new FakeChatClient(" \n\t"), false).complete(REQUEST)).rejects.toThrow(
      "El modelo devolvió una respuesta vacía (GAPS)"
    );
    await expect(service(new FakeChatClient(null), false).complete(REQUEST)).rejects.toThrow(
      "El modelo devolvió una respuesta vacía (GAPS)"
    );
  });

  it("writes one interaction file when logging is on", async () => {
    await service(new FakeChatClient("Respuesta final"), true).complete(REQUEST);

    const files = fs.readdirSync(dir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/_GAPS\.md$/);
    const text = fs.readFileSync(path.join(dir, files[0]), "utf-8");
    expect(text).toContain("# LLM Interaction Log - GAPS");
    expect(text).toContain("Model: test-model");
    expect(text).toContain("## System Prompt\n```text\nSos analista.\n```");
    expect(text).toContain("## Response\n```markdown\nRespuesta final\n```");
  });

  it("writes nothing when logging is off", async () => {
    await service(new FakeChatClient("Respuesta final"), false).complete(REQUEST);

    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it("still returns the content when the interaction file cannot be written", async () => {
    const blocked = path.join(dir, "blocked");
    fs.writeFileSync(blocked, "");

    await expect(
      service(new FakeChatClient("Respuesta final"), true, blocked).complete(REQUEST)
    ).resolves.toBe("Respuesta final");
  });

  it("reports the connection check result", async () => {
    const client = new FakeChatClient("x");
    await expect(service(client, false).testConnection()).resolves.toBe(true);

    client.modelsError = new Error("ECONNREFUSED");
    await expect(service(client, false).testConnection()).resolves.toBe(false);
  });
});
