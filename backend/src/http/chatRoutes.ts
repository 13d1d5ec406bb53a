import { Router } from "express";

import type { ChatService } from "../services/chatService";
import { authenticateRequest } from "./auth";
import { asyncRoute, sendError } from "./errors";
import { bodyOf } from "./request";
import { catalogEntryToJson, chatToJson, messageToJson } from "./serializers";

export type ChatRoutesDeps = Readonly<{
  jwtSecret: string;
  chatService: ChatService;
}>;

export function createChatRoutes(deps: ChatRoutesDeps): Router {
  const router = Router();
  const { chatService, jwtSecret } = deps;

  router.post(
    "/chats",
    asyncRoute(async (req, res) => {
      const auth = authenticateRequest(req, jwtSecret);
      if (!auth.ok) return sendError(res, auth.error);
      const body = bodyOf(req);
      const result = await chatService.createChat(auth.value, {
        chatId: body.chat_id,
        chatName: body.chat_name,
        participants: body.participants
      });
      if (!result.ok) return sendError(res, result.error);
      return res.status(201).json(chatToJson(result.value));
    })
  );

  router.post(
    "/chats/direct",
    asyncRoute(async (req, res) => {
      const auth = authenticateRequest(req, jwtSecret);
      if (!auth.ok) return sendError(res, auth.error);
      const result = await chatService.getOrCreateDirectChat(auth.value, bodyOf(req).user_id);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ chat_id: result.value.chatId });
    })
  );

  router.get(
    "/chats",
    asyncRoute(async (req, res) => {
      const auth = authenticateRequest(req, jwtSecret);
      if (!auth.ok) return sendError(res, auth.error);
      const result = await chatService.listChats(auth.value);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value.map(chatToJson));
    })
  );

  router.get(
    "/chats/:chatId",
    asyncRoute(async (req, res) => {
      const auth = authenticateRequest(req, jwtSecret);
      if (!auth.ok) return sendError(res, auth.error);
      const result = await chatService.getChat(auth.value, req.params.chatId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(chatToJson(result.value));
    })
  );

  router.get(
    "/chats/:chatId/messages",
    asyncRoute(async (req, res) => {
      const auth = authenticateRequest(req, jwtSecret);
      if (!auth.ok) return sendError(res, auth.error);
      const result = await chatService.listMessages(auth.value, req.params.chatId, {
        limit: req.query.limit,
        offset: req.query.offset
      });
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value.map(messageToJson));
    })
  );

  router.post(
    "/chats/:chatId/messages",
    asyncRoute(async (req, res) => {
      const auth = authenticateRequest(req, jwtSecret);
      if (!auth.ok) return sendError(res, auth.error);
      const body = bodyOf(req);
      const result = await chatService.sendMessage(auth.value, req.params.chatId, {
        messageId: body.message_id,
        content: body.content
      });
      if (!result.ok) return sendError(res, result.error);
      if (!result.value.created) {
        return res.status(200).json({ message_id: result.value.messageId, duplicate: true });
      }
      return res.status(201).json(messageToJson(result.value.message));
    })
  );

  router.post(
    "/chats/:chatId/participants",
    asyncRoute(async (req, res) => {
      const auth = authenticateRequest(req, jwtSecret);
      if (!auth.ok) return sendError(res, auth.error);
      const result = await chatService.addParticipant(auth.value, req.params.chatId, bodyOf(req).user_id);
      if (!result.ok) return sendError(res, result.error);
      return result.value.added
        ? res.status(201).json({ status: "added" })
        : res.status(200).json({ status: "already_participant" });
    })
  );

  router.delete(
    "/chats/:chatId/participants/:userId",
    asyncRoute(async (req, res) => {
      const auth = authenticateRequest(req, jwtSecret);
      if (!auth.ok) return sendError(res, auth.error);
      const result = await chatService.removeParticipant(auth.value, req.params.chatId, req.params.userId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ status: result.value.removed ? "removed" : "not_participant" });
    })
  );

  router.post(
    "/messages/:messageId/reactions",
    asyncRoute(async (req, res) => {
      const auth = authenticateRequest(req, jwtSecret);
      if (!auth.ok) return sendError(res, auth.error);
      const body = bodyOf(req);
      const result = await chatService.addReaction(auth.value, req.params.messageId, {
        reactionId: body.reaction_id,
        reactionCode: body.reaction_code
      });
      if (!result.ok) return sendError(res, result.error);
      if (!result.value.created) {
        return res.status(200).json({ reaction_id: result.value.reactionId, duplicate: true });
      }
      return res.status(201).json({ reaction_id: result.value.reaction.reactionId, duplicate: false });
    })
  );

  router.delete(
    "/messages/:messageId/reactions/:reactionCode",
    asyncRoute(async (req, res) => {
      const auth = authenticateRequest(req, jwtSecret);
      if (!auth.ok) return sendError(res, auth.error);
      const result = await chatService.removeReaction(auth.value, req.params.messageId, req.params.reactionCode);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ status: "success", removed: result.value.removed });
    })
  );

  router.get(
    "/reactions/catalog",
    asyncRoute(async (req, res) => {
      const auth = authenticateRequest(req, jwtSecret);
      if (!auth.ok) return sendError(res, auth.error);
      const result = await chatService.listReactionCatalog();
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value.map(catalogEntryToJson));
    })
  );

  return router;
}
