export { ollamaAdapter, decodeOllamaLine } from "./ollama.js";
export { xaiAdapter, accumulateToolCalls } from "./xai.js";
export { geminiAdapter, decodeGeminiItem } from "./gemini.js";
