import type { Actor } from "../workflow/model.js";

/**
 * 聊天前端的投递能力。mentions 为用户名（不含 @），由实现决定如何渲染。
 */
export interface ChatDelivery {
  sendMessage(chatId: string, text: string, mentions?: readonly string[]): Promise<void>;
  updateMessage(chatId: string, messageId: string, text: string): Promise<void>;
}

export type ProjectRole = "approver" | "ops";

export interface Authorizer {
  isAuthorized(project: string, actor: Actor, role: ProjectRole): boolean;
}
