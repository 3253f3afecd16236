import OpenAI from "openai";
import type { ChatCompletionContentPart } from "openai/resources/chat/completions";
import pdfParse from "pdf-parse";
import mammoth from "mammoth";
import type { ExtractionResult, MediaKind } from "../types/permit";
import { parseModelReply } from "./model-reply";

export interface ExtractionInput {
  content: Buffer;
  mediaKind: MediaKind;
  fileName: string;
}

/**
 * Opaque entity extraction capability. Implementations report their own
 * failures as `{ ok: false }`; a thrown error is treated as a fault.
 */
export interface EntityExtractor {
  extract(input: ExtractionInput, options: { signal: AbortSignal }): Promise<ExtractionResult>;
}

interface OpenAIEntityExtractorOptions {
  apiKey: string;
  baseUrl?: string;
  textModel: string;
  visionModel: string;
  maxTokens?: number;
}

const FIELD_LIST = `- Applicant name (žadatel)
- Company ID (IČO) if applicable
- Contact details (phone, email, address)
- Purpose of use (účel užívání)
- Specific location (address/plot number)
- Duration (start and end date)
- Area in square meters if mentioned`;

const IMAGE_PROMPT = `Extract the following information from this application form for the special use of public space (ZUVP):
${FIELD_LIST}

If the document is not a ZUVP application, answer "Not a ZUVP document". Otherwise return JSON only.`;

function textPrompt(text: string): string {
  return `Extract the following information from this ZUVP application text:
${FIELD_LIST}

Text: ${text}

If the text is not a ZUVP application, answer "Not a ZUVP document". Otherwise return JSON only.`;
}

/**
 * Entity extractor backed by an OpenAI-compatible chat completion API.
 * Text, PDF and DOCX submissions go to the text model; images to the vision model.
 */
export class OpenAIEntityExtractor implements EntityExtractor {
  private readonly client: OpenAI;
  private readonly textModel: string;
  private readonly visionModel: string;
  private readonly maxTokens: number;

  constructor(options: OpenAIEntityExtractorOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
    this.textModel = options.textModel;
    this.visionModel = options.visionModel;
    this.maxTokens = options.maxTokens ?? 1000;
  }

  async extract(input: ExtractionInput, options: { signal: AbortSignal }): Promise<ExtractionResult> {
    try {
      if (input.mediaKind === "image") {
        return await this.analyzeImage(input, options.signal);
      }

      const text = await this.readText(input);
      if (!text.trim()) {
        return { ok: false, error: `No text content found in ${input.fileName}` };
      }
      return await this.complete(this.textModel, textPrompt(text), options.signal);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: `Extraction failed: ${message}` };
    }
  }

  private async readText(input: ExtractionInput): Promise<string> {
    switch (input.mediaKind) {
      case "pdf": {
        const parsed = await pdfParse(input.content);
        return parsed.text;
      }
      case "docx": {
        const result = await mammoth.extractRawText({ buffer: input.content });
        return result.value;
      }
      default:
        return input.content.toString("utf8");
    }
  }

  private async analyzeImage(input: ExtractionInput, signal: AbortSignal): Promise<ExtractionResult> {
    const mimeType = input.fileName.toLowerCase().endsWith(".png") ? "image/png" : "image/jpeg";
    const content: ChatCompletionContentPart[] = [
      { type: "text", text: IMAGE_PROMPT },
      {
        type: "image_url",
        image_url: { url: `data:${mimeType};base64,${input.content.toString("base64")}` },
      },
    ];
    return this.complete(this.visionModel, content, signal);
  }

  private async complete(
    model: string,
    content: string | ChatCompletionContentPart[],
    signal: AbortSignal
  ): Promise<ExtractionResult> {
    const completion = await this.client.chat.completions.create(
      {
        model,
        messages: [{ role: "user", content }],
        max_tokens: this.maxTokens,
      },
      { signal }
    );

    const reply = completion.choices[0]?.message?.content;
    if (!reply) {
      return { ok: false, error: "Invalid API response format" };
    }
    return { ok: true, fields: parseModelReply(reply) };
  }
}
