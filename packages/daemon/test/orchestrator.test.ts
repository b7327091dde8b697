import { describe, it, expect, vi } from "vitest";
import { ProviderError } from "@ember/core";
import type { ChatMessage, LlmEvent, LlmGateway } from "@ember/llm";
import type { AssembledContext } from "@ember/sessions";
import { MAX_TURNS, previewToolResult, runExchange } from "@ember/daemon";
import type { Reply, ToolExecutor } from "@ember/daemon";

const CONTEXT: AssembledContext = {
	messages: [
		{ role: "system", content: "You are Ember." },
		{ role: "user", content: "hi" },
	],
	skills: [],
	tools: [],
};

/** Gateway stand-in: turn `n` (1-based) streams `turns(n)`. */
function scriptedGateway(turns: (n: number) => LlmEvent[] | Error): LlmGateway & { requests: ChatMessage[][] } {
	const requests: ChatMessage[][] = [];
	return {
		requests,
		embed: async () => [],
		async streamChat(_model, messages) {
			requests.push([...messages]);
			const script = turns(requests.length);
			if (script instanceof Error) throw script;
			return (async function* () {
				yield* script;
			})();
		},
	};
}

function echoExecutor(): ToolExecutor & { calls: string[] } {
	const calls: string[] = [];
	return {
		calls,
		async execute(call) {
			calls.push(call.id);
			return { result: `done ${call.id}` };
		},
	};
}

function run(gateway: LlmGateway, executor: ToolExecutor) {
	const replies: Reply[] = [];
	const result = runExchange({
		gateway,
		executor,
		sessionId: "s",
		model: "ollama/llama3.2",
		context: CONTEXT,
		userMessage: "hi",
		emit: (r) => replies.push(r),
	});
	return { replies, result };
}

describe("runExchange", () => {
	it("should stream a plain answer in one turn", async () => {
		const gateway = scriptedGateway(() => [
			{ type: "text", text: "Hel" },
			{ type: "text", text: "" },
			{ type: "text", text: "lo" },
		]);
		const executor = echoExecutor();
		const { replies, result } = run(gateway, executor);

		expect(await result).toEqual({ text: "Hello", turns: 1 });
		expect(replies).toEqual([
			{ event: "response", session_id: "s", delta: "Hel", done: false },
			{ event: "response", session_id: "s", delta: "lo", done: false },
		]);
		expect(executor.calls).toEqual([]);
	});

	it("should feed tool results back to the model", async () => {
		const gateway = scriptedGateway((n) =>
			n === 1
				? [{ type: "tool_call", id: "c1", name: "greet", arguments: '{"name":"x"}' }]
				: [{ type: "text", text: "ok" }],
		);
		const { replies, result } = run(gateway, echoExecutor());

		expect(await result).toEqual({ text: "ok", turns: 2 });
		expect(gateway.requests[1]).toEqual([
			...CONTEXT.messages,
			{
				role: "assistant",
				content: "",
				toolCalls: [{ id: "c1", name: "greet", arguments: '{"name":"x"}' }],
			},
			{ role: "tool", content: "done c1", toolCallId: "c1", name: "greet" },
		]);
		expect(replies[0]).toEqual({
			event: "tool_call",
			session_id: "s",
			tool: "greet",
			tool_call_id: "c1",
			args: { name: "x" },
			result: "done c1",
		});
	});

	it("should stop a model that always calls tools after exactly ten requests", async () => {
		const gateway = scriptedGateway((n) => [
			{ type: "text", text: "t" },
			{ type: "tool_call", id: `c${n}`, name: "greet", arguments: "{}" },
		]);
		const executor = echoExecutor();
		const { replies, result } = run(gateway, executor);

		expect(await result).toEqual({ text: "tttttttttt", turns: MAX_TURNS });
		expect(gateway.requests).toHaveLength(10);
		expect(executor.calls).toHaveLength(10);
		expect(replies.filter((r) => r.event === "tool_call")).toHaveLength(10);
	});

	it("should report a failed request as a stream error", async () => {
		const gateway = scriptedGateway(() => new ProviderError("LLM request failed: boom", "ollama", 503));
		const { replies, result } = run(gateway, echoExecutor());

		expect(await result).toEqual({ text: "", turns: 1, error: "LLM request failed: boom" });
		expect(replies).toEqual([{ error: "LLM Stream Error: LLM request failed: boom", session_id: "s" }]);
	});

	it("should keep text streamed before a mid-stream failure", async () => {
		const gateway: LlmGateway = {
			embed: async () => [],
			async streamChat() {
				return (async function* (): AsyncGenerator<LlmEvent> {
					yield { type: "text", text: "par" };
					throw new Error("connection reset");
				})();
			},
		};
		const executor = echoExecutor();
		const spy = vi.spyOn(executor, "execute");
		const { replies, result } = run(gateway, executor);

		expect(await result).toEqual({ text: "par", turns: 1, error: "connection reset" });
		expect(replies.at(-1)).toEqual({ error: "LLM Stream Error: connection reset", session_id: "s" });
		expect(spy).not.toHaveBeenCalled();
	});
});

describe("previewToolResult", () => {
	it("should cap the preview at 200 characters", () => {
		expect(previewToolResult("x".repeat(300))).toBe("x".repeat(200));
		expect(previewToolResult("short")).toBe("short");
	});
});
