import { ProductCandidate } from "../types";
import { PageContext } from "./extract";
import { LanguageModel, parseModelJson } from "./llm";
import { errorMessage, Logger } from "./logger";
import { isRecord } from "./normalize";
import { htmlToText } from "./text";

export interface LlmExtractorOptions {
  maxChars: number;
}

export function buildExtractionPrompt(pageText: string, context: PageContext): string {
  return `Bạn là công cụ trích xuất dữ liệu sản phẩm điện thoại từ trang thương mại điện tử.
Trang: ${context.url}
Cửa hàng: ${context.sourceName}

Nội dung trang:
"""
${pageText}
"""

Trả về một mảng JSON các sản phẩm điện thoại có trên trang, đặt trong khối \`\`\`json.
Mỗi sản phẩm có dạng:
{
  "name": "tên đầy đủ",
  "brand": "thương hiệu",
  "model": "model",
  "description": "mô tả ngắn",
  "image_url": ["https://..."],
  "specifications": {
    "cpu": "", "ram": "", "storage": "", "display": "", "camera": "", "battery": "", "os": "",
    "connectivity": [], "color": [], "dimensions": "", "weight": ""
  },
  "sources": [{ "name": "${context.sourceName}", "url": "${context.url}", "price": 0, "price_currency": "VND", "in_stock": true }]
}
Giá là số nguyên VND. Bỏ qua phụ kiện. Nếu không có sản phẩm nào, trả về [].`;
}

function candidateList(parsed: unknown): unknown[] {
  if (Array.isArray(parsed)) {
    return parsed;
  }
  if (isRecord(parsed)) {
    return Array.isArray(parsed.products) ? parsed.products : [parsed];
  }
  return [];
}

// The model sometimes puts a bare price on the product instead of a source entry.
function withPageSource(candidate: ProductCandidate, context: PageContext): ProductCandidate {
  const sources = candidate.sources;
  if (Array.isArray(sources) && sources.length > 0) {
    return {
      ...candidate,
      sources: sources.map((source) =>
        isRecord(source)
          ? { name: context.sourceName, url: context.url, last_updated: context.now, ...source }
          : source
      )
    };
  }
  if (candidate.price === undefined) {
    return candidate;
  }
  return {
    ...candidate,
    sources: [{ name: context.sourceName, url: context.url, price: candidate.price, price_currency: "VND", last_updated: context.now }]
  };
}

/** Visible page text → model → JSON array of candidates. Never throws; failures yield []. */
export class LlmProductExtractor {
  constructor(
    private readonly model: LanguageModel,
    private readonly options: LlmExtractorOptions,
    private readonly logger: Logger
  ) {}

  async extract(html: string, context: PageContext): Promise<ProductCandidate[]> {
    const text = htmlToText(html).slice(0, this.options.maxChars);
    if (!text) {
      return [];
    }

    let reply: string;
    try {
      reply = await this.model.generate(buildExtractionPrompt(text, context), { temperature: 0 });
    } catch (error) {
      this.logger.warn("llm_extraction_failed", { url: context.url, error: errorMessage(error) });
      return [];
    }

    const parsed = parseModelJson(reply);
    if (parsed === null) {
      this.logger.warn("llm_extraction_unparsable", { url: context.url, chars: reply.length });
      return [];
    }

    const candidates = candidateList(parsed)
      .filter(isRecord)
      .map((candidate) => withPageSource(candidate, context));
    this.logger.debug("llm_extraction_completed", { url: context.url, candidates: candidates.length });
    return candidates;
  }
}
