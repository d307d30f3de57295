import { Router } from "express";
import { Logger } from "../lib/logger";
import { ChatOrchestrator } from "../services/chat";
import { ChatRequestSchema } from "../types";

const SESSION_NOT_FOUND = "Không tìm thấy phiên chat";

export function createChatRouter(chat: ChatOrchestrator, logger: Logger): Router {
  const router = Router();

  router.post("/send", async (request, response, next) => {
    const parsed = ChatRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      logger.warn("chat_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      response.json(await chat.sendMessage(parsed.data.message, parsed.data.session_id));
    } catch (error) {
      next(error);
    }
  });

  router.get("/history/:sessionId", (request, response) => {
    const session = chat.getHistory(request.params.sessionId);
    if (!session) {
      logger.warn("session_not_found", { session_id: request.params.sessionId });
      response.status(404).json({ error: SESSION_NOT_FOUND });
      return;
    }
    response.json(session);
  });

  router.delete("/history/:sessionId", (request, response) => {
    if (!chat.deleteSession(request.params.sessionId)) {
      logger.warn("session_not_found", { session_id: request.params.sessionId });
      response.status(404).json({ error: SESSION_NOT_FOUND });
      return;
    }
    logger.info("session_deleted", { session_id: request.params.sessionId });
    response.json({ message: "Phiên chat đã được xóa thành công" });
  });

  return router;
}
