import { z } from "zod";
import { LanguageModel, parseModelJson } from "../lib/llm";
import { errorMessage, Logger } from "../lib/logger";
import { ChatMessage, ProductListRequest, REFLECTION_ACTIONS, ReflectionResult, toPrice } from "../types";

const HISTORY_WINDOW = 6;

const CHAT_ACTIONS = ["product_list", "product_detail", "product_comparison", "answer"] as const;
const LIST_ACTIONS = ["rag_query", "crawl"] as const;

const ChatDecisionSchema = z.object({
  action: z.enum(REFLECTION_ACTIONS),
  query: z.string().optional(),
  confidence: z.coerce.number().min(0).max(1).catch(0),
  additional_info: z.record(z.unknown()).nullish()
});

const ListDecisionSchema = z.object({
  decision: z.enum(REFLECTION_ACTIONS),
  explanation: z.string().optional(),
  confidence: z.coerce.number().min(0).max(1).catch(0.8)
});

export function formatChatHistory(history: ChatMessage[]): string {
  return history
    .slice(-HISTORY_WINDOW)
    .map((message) => `${message.role === "user" ? "Người dùng" : "Trợ lý"}: ${message.content}`)
    .join("\n");
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((entry) => entry === value);
}

export function readNumber(info: Record<string, unknown>, key: string): number | undefined {
  const value = info[key];
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  return toPrice(value);
}

export function readString(info: Record<string, unknown>, key: string): string | undefined {
  const value = info[key];
  if (typeof value === "number") {
    return String(value);
  }
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/** Accepts a list or a comma-separated string. */
export function readStringList(info: Record<string, unknown>, key: string): string[] {
  const value = info[key];
  const entries = Array.isArray(value) ? value : typeof value === "string" ? value.split(",") : [];
  return entries
    .map((entry) => (typeof entry === "string" || typeof entry === "number" ? String(entry).trim() : ""))
    .filter((entry) => entry.length > 0);
}

export function buildChatReflectionPrompt(message: string, history: ChatMessage[]): string {
  return `Hãy phân tích tin nhắn này từ người dùng và lịch sử chat để xác định hành động tiếp theo.

Tin nhắn: ${message}

Lịch sử chat (3 lượt gần nhất):
${formatChatHistory(history)}

Hãy phân loại tin nhắn này vào một trong các hành động sau:
1. product_list: Người dùng đang tìm kiếm danh sách sản phẩm
2. product_detail: Người dùng đang yêu cầu thông tin chi tiết về một sản phẩm cụ thể
3. product_comparison: Người dùng muốn so sánh các sản phẩm
4. answer: Trả lời câu hỏi thông thường

Trả về kết quả dưới dạng JSON theo định dạng sau:
\`\`\`json
{
  "action": "action_name",
  "query": "truy vấn tìm kiếm",
  "confidence": 0.9,
  "additional_info": {}
}
\`\`\`

Đối với product_list, additional_info nên bao gồm price_min, price_max (VND) và brands (danh sách thương hiệu) nếu có.
Đối với product_detail, additional_info nên bao gồm product_id hoặc product_name nếu có.
Đối với product_comparison, additional_info nên bao gồm product_ids hoặc product_names nếu có.`;
}

export function buildListReflectionPrompt(request: Omit<ProductListRequest, "page" | "limit">): string {
  const none = "Không có";
  return `Xác định xem nên truy vấn dữ liệu từ cơ sở dữ liệu RAG hiện có hay nên crawl dữ liệu mới.

Yêu cầu tìm kiếm:
- Query: ${request.query}
- Giá tối thiểu: ${request.price_min ?? none}
- Giá tối đa: ${request.price_max ?? none}
- Thương hiệu: ${request.brands && request.brands.length > 0 ? request.brands.join(", ") : none}
- Sắp xếp theo: ${request.sort_by}

Hãy quyết định:
1. "rag_query": Sử dụng dữ liệu từ cơ sở dữ liệu RAG hiện có
2. "crawl": Crawl dữ liệu mới từ web

Trả về kết quả JSON với decision, explanation và confidence.
\`\`\`json
{
  "decision": "rag_query",
  "explanation": "Lý do quyết định",
  "confidence": 0.8
}
\`\`\``;
}

/**
 * Routing decisions. Every method returns a usable result: model errors and unreadable
 * replies fall back to a fixed default instead of propagating.
 */
export class ReflectionService {
  constructor(
    private readonly model: LanguageModel,
    private readonly logger: Logger
  ) {}

  private async ask(prompt: string, operation: string): Promise<unknown> {
    try {
      const reply = await this.model.generate(prompt);
      const parsed = parseModelJson(reply);
      if (parsed === null) {
        this.logger.warn("reflection_unparsable", { operation, chars: reply.length });
      }
      return parsed;
    } catch (error) {
      this.logger.warn("reflection_failed", { operation, error: errorMessage(error) });
      return null;
    }
  }

  async reflectOnChatMessage(message: string, history: ChatMessage[]): Promise<ReflectionResult> {
    const fallback: ReflectionResult = { action: "answer", query: message, confidence: 0.5, additional_info: {} };
    const parsed = ChatDecisionSchema.safeParse(await this.ask(buildChatReflectionPrompt(message, history), "chat"));
    if (!parsed.success || !isOneOf(CHAT_ACTIONS, parsed.data.action)) {
      return fallback;
    }

    const result: ReflectionResult = {
      action: parsed.data.action,
      query: parsed.data.query?.trim() || message,
      confidence: parsed.data.confidence,
      additional_info: parsed.data.additional_info ?? {}
    };
    this.logger.info("chat_reflected", { action: result.action, confidence: result.confidence });
    return result;
  }

  async reflectOnProductList(request: Omit<ProductListRequest, "page" | "limit">): Promise<ReflectionResult> {
    const info: Record<string, unknown> = {
      price_min: request.price_min,
      price_max: request.price_max,
      brands: request.brands
    };
    const parsed = ListDecisionSchema.safeParse(await this.ask(buildListReflectionPrompt(request), "product_list"));
    if (!parsed.success || !isOneOf(LIST_ACTIONS, parsed.data.decision)) {
      return { action: "rag_query", query: request.query, confidence: 0.7, additional_info: info };
    }

    this.logger.info("product_list_reflected", { action: parsed.data.decision, confidence: parsed.data.confidence });
    return {
      action: parsed.data.decision,
      query: request.query,
      confidence: parsed.data.confidence,
      additional_info: { ...info, explanation: parsed.data.explanation ?? "" }
    };
  }

  /** Details always start from the index; callers crawl when it has nothing. */
  async reflectOnProductDetail(productId: string): Promise<ReflectionResult> {
    return {
      action: "rag_query",
      query: `product:${productId}`,
      confidence: 0.9,
      additional_info: { product_id: productId }
    };
  }
}
