/**
 * Fixed prompt templates. The corpus and its users are Chinese-language, so
 * are the instructions sent to the models.
 */
import type { CorpusDocument } from "./types";

/** System instruction for condensing a chat history into one standalone question. */
export const SUMMARIZE_HISTORY_INSTRUCTION = "请根据以下提供的聊天记录历史，总结出一条用户的原始问题。";

/** User message for the final answer: the standalone question plus the retrieved context. */
export function answerPrompt(question: string, context: string): string {
  return `请根据以下检索到的信息，回答用户的原始问题：${question}\n\n${context}`;
}

/** Context blob handed to the answering model (and returned by the tool). */
export function formatContext(documents: readonly CorpusDocument[]): string {
  let out = `检索到以下${documents.length}篇文档：\n\n`;
  documents.forEach((doc, i) => {
    out += `第${i + 1}篇文档`;
    if (doc.title.length > 0) out += `，标题为「${doc.title}」`;
    out += `：\n\n${doc.content}\n\n`;
  });
  return out;
}

export function toolDescription(topic: string): string {
  return `当用户查询${topic}问题时调用此函数`;
}

export const TOOL_QUESTION_DESCRIPTION =
  "用户提出的原始问题。如果是多轮回话，请分析上下文后给出最终的完整问题。";
