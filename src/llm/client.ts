import Anthropic from "@anthropic-ai/sdk";
import { loadEnv } from "../config/env.js";

let _client: Anthropic | null = null;

export function getAnthropicClient(): Anthropic {
  if (!_client) _client = new Anthropic({ apiKey: loadEnv().ANTHROPIC_API_KEY });
  return _client;
}
