// INTERNAL ONLY – model-played prospect for batch runs. Sees the conversation
// from the prospect's side: bot messages arrive as "user" turns.

import { completeChat, toChatTurns, type ChatClient } from "./openaiClient";
import { createProspectPrompt } from "./prospectProfile";
import type {
  BackendReply,
  ConversationMessage,
  ModelSettings,
  ProspectAgent,
  ProspectProfile,
} from "./types";

export class OpenAIProspectAgent implements ProspectAgent {
  constructor(
    private readonly client: ChatClient,
    private readonly settings: ModelSettings
  ) {}

  async respond(
    profile: ProspectProfile,
    messages: readonly ConversationMessage[]
  ): Promise<BackendReply> {
    const turns = toChatTurns(createProspectPrompt(profile), messages, "prospect");
    return completeChat(this.client, turns, this.settings);
  }
}
