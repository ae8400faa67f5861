import { GoogleGenAI } from "@google/genai";
import type { AIConfig } from "../config/AppConfig";
import type { GenerationTask } from "../domain/WorkflowErrors";

// The only place this backend talks to a model provider.
// Task modules depend on the two service interfaces below; tests supply fakes.

export interface TextGenerationRequest {
  readonly task: GenerationTask;
  readonly prompt: string;
  readonly signal?: AbortSignal;
}

export interface TextGenerationService {
  generate(request: TextGenerationRequest): Promise<string>;
}

export interface GroundingSource {
  readonly uri: string;
  readonly title?: string;
}

// A span of the answer and the indices (into `sources`) of the pages that back it.
export interface GroundingSupport {
  readonly text: string;
  readonly sourceIndices: readonly number[];
}

export interface GroundedSearchResponse {
  readonly text: string;
  readonly sources: readonly GroundingSource[];
  readonly supports: readonly GroundingSupport[];
}

export interface GroundedSearchRequest {
  readonly prompt: string;
  readonly signal?: AbortSignal;
}

export interface GroundedSearchService {
  search(request: GroundedSearchRequest): Promise<GroundedSearchResponse>;
}

export class GeminiGenerationClient implements TextGenerationService, GroundedSearchService {
  private client: GoogleGenAI | undefined;

  constructor(private readonly config: AIConfig) {}

  get mode(): "vertex" | "api-key" | "unconfigured" {
    if (this.config.project) return "vertex";
    return this.config.apiKey ? "api-key" : "unconfigured";
  }

  // Created on first use so the server can boot (and serve the directory) without credentials.
  private ai(): GoogleGenAI {
    if (this.client) return this.client;
    if (this.config.project) {
      this.client = new GoogleGenAI({ vertexai: true, project: this.config.project, location: this.config.location });
    } else if (this.config.apiKey) {
      this.client = new GoogleGenAI({ apiKey: this.config.apiKey });
    } else {
      throw new Error("No model credentials configured. Set GOOGLE_CLOUD_PROJECT or GEMINI_API_KEY.");
    }
    return this.client;
  }

  async generate(request: TextGenerationRequest): Promise<string> {
    const response = await this.ai().models.generateContent({
      model: this.config.model,
      contents: request.prompt,
      config: {
        responseMimeType: "application/json",
        temperature: 0.2,
        abortSignal: request.signal,
      },
    });
    return (response.text ?? "").trim();
  }

  async search(request: GroundedSearchRequest): Promise<GroundedSearchResponse> {
    const response = await this.ai().models.generateContent({
      model: this.config.model,
      contents: request.prompt,
      config: {
        tools: [{ googleSearch: {} }],
        temperature: 1.0,
        abortSignal: request.signal,
      },
    });

    const metadata = response.candidates?.[0]?.groundingMetadata;
    const sources: GroundingSource[] = (metadata?.groundingChunks ?? []).map((chunk) => ({
      uri: chunk.web?.uri ?? "",
      ...(chunk.web?.title ? { title: chunk.web.title } : {}),
    }));
    const supports: GroundingSupport[] = (metadata?.groundingSupports ?? []).map((support) => ({
      text: support.segment?.text ?? "",
      sourceIndices: support.groundingChunkIndices ?? [],
    }));

    return { text: (response.text ?? "").trim(), sources, supports };
  }
}
