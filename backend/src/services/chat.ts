import { CrawlService } from "../crawlers/crawler";
import { LanguageModel } from "../lib/llm";
import { errorMessage, Logger } from "../lib/logger";
import { SessionStore } from "../lib/sessions";
import { formatVnd } from "../lib/text";
import {
  ChatData,
  ChatMessage,
  ChatResponse,
  ChatSession,
  MessageType,
  Product,
  ProductSpecification,
  ReflectionResult
} from "../types";
import { formatChatHistory, readNumber, readString, readStringList, ReflectionService } from "./reflection";
import { RetrievalService } from "./retrieval";

export const FALLBACK_REPLY = "Xin lỗi, tôi không thể xử lý yêu cầu của bạn lúc này. Vui lòng thử lại sau.";

const CHAT_RESULT_LIMIT = 10;
const PROMPT_PRODUCT_LIMIT = 10;
const COMPARISON_QUERY_LIMIT = 5;
const MAX_COMPARED = 3;

const PERSONA = `Bạn là trợ lý chatbot thông minh cho website so sánh giá điện thoại ở Việt Nam.
Hãy trả lời ngắn gọn và đầy đủ thông tin cho yêu cầu của người dùng dưới đây.`;

export function formatSpecifications(specs: ProductSpecification): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(specs)) {
    if (key.startsWith("additional_")) {
      continue;
    }
    const text = Array.isArray(value) ? value.join(" / ") : value;
    if (typeof text === "string" && text) {
      parts.push(`${key}: ${text}`);
    }
  }
  return parts.length > 0 ? parts.join(", ") : "Chưa có thông tin chi tiết.";
}

export function formatProductsInfo(products: Product[]): string {
  if (products.length === 0) {
    return "Không tìm thấy sản phẩm phù hợp.";
  }
  const lines = products
    .slice(0, PROMPT_PRODUCT_LIMIT)
    .map(
      (product, index) =>
        `${index + 1}. Tên: ${product.name}\nThương hiệu: ${product.brand}\nGiá: ${formatVnd(product.min_price)} - ${formatVnd(product.max_price)} VND`
    );
  if (products.length > PROMPT_PRODUCT_LIMIT) {
    lines.push(`... và ${products.length - PROMPT_PRODUCT_LIMIT} sản phẩm khác`);
  }
  return lines.join("\n\n");
}

function promptHeader(message: string, history: ChatMessage[]): string {
  return `${PERSONA}

Lịch sử trò chuyện:
${formatChatHistory(history)}

Yêu cầu hiện tại của người dùng: "${message}"`;
}

function productBlock(product: Product, withDescription: boolean): string {
  return [
    `Tên: ${product.name}`,
    `Thương hiệu: ${product.brand}`,
    ...(withDescription ? [`Mô tả: ${product.description ?? ""}`] : []),
    `Giá thấp nhất: ${formatVnd(product.min_price)} VND`,
    `Giá cao nhất: ${formatVnd(product.max_price)} VND`,
    `Thông số kỹ thuật: ${formatSpecifications(product.specifications)}`
  ].join("\n");
}

export function buildAnswerPrompt(message: string, history: ChatMessage[], type: MessageType, data: ChatData): string {
  const header = promptHeader(message, history);
  const closing = "Trả lời bằng tiếng Việt, ngắn gọn và thân thiện.";

  switch (type) {
    case "product_list":
      return `${header}

Danh sách sản phẩm:
${formatProductsInfo(data.products ?? [])}

Hãy trả lời để giới thiệu danh sách sản phẩm phù hợp với yêu cầu.
Chỉ trả lời một đoạn văn ngắn gọn, không quá 3-4 câu.
Không liệt kê tất cả sản phẩm, chỉ nêu các sản phẩm nổi bật nhất (tối đa 3 sản phẩm).
Nêu rõ khoảng giá (từ thấp nhất đến cao nhất) và các thương hiệu có trong kết quả.
Nói với người dùng rằng họ có thể xem chi tiết danh sách sản phẩm ở trên màn hình.

${closing}`;
    case "product_detail":
      return `${header}

Thông tin chi tiết sản phẩm:
${data.product ? productBlock(data.product, true) : "Không tìm thấy sản phẩm phù hợp."}

Hãy tóm tắt thông tin sản phẩm một cách ngắn gọn (không quá 3-4 câu).
Tập trung vào các điểm mạnh và đặc điểm nổi bật.
Nêu giá rõ ràng.
Nói với người dùng rằng họ có thể xem chi tiết đầy đủ trên màn hình.

${closing}`;
    case "product_comparison":
      return `${header}

Thông tin các sản phẩm so sánh:
${(data.products ?? []).map((product) => productBlock(product, false)).join("\n---\n")}

Hãy so sánh các sản phẩm một cách khách quan.
Nêu ra điểm mạnh, điểm yếu của mỗi sản phẩm và những điểm khác biệt chính.
Trình bày ngắn gọn không quá 5-6 câu.
Đề xuất nên chọn sản phẩm nào dựa trên giá-hiệu năng và nhu cầu phổ biến.
Nói với người dùng rằng họ có thể xem bảng so sánh chi tiết trên màn hình.

${closing}`;
    case "text":
      return `${header}

Hãy trả lời câu hỏi hoặc yêu cầu của người dùng.
Nếu họ đang tìm kiếm thông tin về sản phẩm, giới thiệu họ có thể tìm kiếm điện thoại bằng cách hỏi về:
1. Tên model cụ thể (ví dụ: "iPhone 15 Pro")
2. Thương hiệu (ví dụ: "Điện thoại Samsung")
3. Khoảng giá (ví dụ: "Điện thoại dưới 8 triệu")
4. Nhu cầu sử dụng (ví dụ: "Điện thoại chơi game tốt")

${closing}
Giữ câu trả lời không quá 3-4 câu.`;
  }
}

interface ActionOutcome {
  type: MessageType;
  data: ChatData;
}

const TEXT_OUTCOME: ActionOutcome = { type: "text", data: {} };

/**
 * One chat turn: remember the message, decide what the user wants, gather products for it
 * and phrase an answer. Product lookups that fail degrade to a plain text answer.
 */
export class ChatOrchestrator {
  constructor(
    private readonly sessions: SessionStore,
    private readonly reflection: ReflectionService,
    private readonly retrieval: RetrievalService,
    private readonly crawler: CrawlService,
    private readonly model: LanguageModel,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async sendMessage(message: string, sessionId?: string): Promise<ChatResponse> {
    const session = this.sessions.getOrCreate(sessionId);
    this.sessions.append(session.id, { role: "user", content: message, type: "text", timestamp: this.now().toISOString() });

    const decision = await this.reflection.reflectOnChatMessage(message, session.messages);
    let outcome = TEXT_OUTCOME;
    try {
      outcome = await this.handle(decision);
    } catch (error) {
      this.logger.error("chat_action_failed", { session_id: session.id, action: decision.action, error: errorMessage(error) });
    }

    const content = await this.answer(message, session.messages, outcome);
    const reply: ChatMessage = {
      role: "assistant",
      content,
      type: outcome.type,
      timestamp: this.now().toISOString(),
      metadata: outcome.data
    };
    this.sessions.append(session.id, reply);
    this.logger.info("chat_replied", { session_id: session.id, action: decision.action, type: outcome.type });
    return { session_id: session.id, response: reply, data: outcome.data };
  }

  getHistory(sessionId: string): ChatSession | undefined {
    return this.sessions.get(sessionId);
  }

  deleteSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private async handle(decision: ReflectionResult): Promise<ActionOutcome> {
    switch (decision.action) {
      case "product_list":
        return { type: "product_list", data: { products: await this.listProducts(decision) } };
      case "product_detail": {
        const product = await this.findProduct(decision);
        return product ? { type: "product_detail", data: { product } } : TEXT_OUTCOME;
      }
      case "product_comparison": {
        const products = await this.findComparison(decision);
        return products.length >= 2 ? { type: "product_comparison", data: { products } } : TEXT_OUTCOME;
      }
      default:
        return TEXT_OUTCOME;
    }
  }

  private async listProducts(decision: ReflectionResult): Promise<Product[]> {
    const info = decision.additional_info;
    const filters = {
      price_min: readNumber(info, "price_min"),
      price_max: readNumber(info, "price_max"),
      brands: readStringList(info, "brands")
    };
    const indexed = await this.retrieval.getProducts({ query: decision.query, ...filters, limit: CHAT_RESULT_LIMIT });
    if (indexed.length > 0) {
      return indexed;
    }
    this.logger.info("index_empty_crawling", { query: decision.query });
    return this.crawler.crawlNewProducts({
      query: decision.query,
      ...filters,
      sort_by: "relevance",
      page: 1,
      limit: CHAT_RESULT_LIMIT
    });
  }

  private async firstMatchId(query: string): Promise<string | undefined> {
    const [match] = await this.retrieval.getProducts({ query, limit: 1 });
    return match?.id;
  }

  /** By id, else by product name, else by the reflected query; crawls when the index misses. */
  private async findProduct(decision: ReflectionResult): Promise<Product | null> {
    const info = decision.additional_info;
    let productId = readString(info, "product_id");
    const productName = readString(info, "product_name");
    if (!productId && productName) {
      productId = await this.firstMatchId(productName);
    }
    if (!productId) {
      productId = await this.firstMatchId(decision.query);
    }
    if (!productId) {
      this.logger.warn("product_not_identified", { query: decision.query });
      return null;
    }
    return (await this.retrieval.getProductById(productId)) ?? (await this.crawler.crawlProductDetail(productId));
  }

  private async findComparison(decision: ReflectionResult): Promise<Product[]> {
    const info = decision.additional_info;
    const products: Product[] = [];
    const add = (product: Product | null | undefined): void => {
      if (product && !products.some((existing) => existing.id === product.id)) {
        products.push(product);
      }
    };

    for (const id of readStringList(info, "product_ids")) {
      add(await this.retrieval.getProductById(id));
    }
    if (products.length < 2) {
      for (const name of readStringList(info, "product_names")) {
        const [match] = await this.retrieval.getProducts({ query: name, limit: 1 });
        add(match);
      }
    }
    if (products.length < 2 && decision.query) {
      const matches = await this.retrieval.getProducts({ query: decision.query, limit: COMPARISON_QUERY_LIMIT });
      for (const match of matches) {
        if (products.length >= MAX_COMPARED) {
          break;
        }
        add(match);
      }
    }
    return products;
  }

  private async answer(message: string, history: ChatMessage[], outcome: ActionOutcome): Promise<string> {
    try {
      const reply = await this.model.generate(buildAnswerPrompt(message, history, outcome.type, outcome.data));
      return reply.trim() || FALLBACK_REPLY;
    } catch (error) {
      this.logger.error("chat_answer_failed", { type: outcome.type, error: errorMessage(error) });
      return FALLBACK_REPLY;
    }
  }
}
