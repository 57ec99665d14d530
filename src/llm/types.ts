import { z } from "zod";

export type Message = {
    role: "system" | "user" | "assistant";
    content: string;
};

/**
 * Opaque signing credential (e.g. a wallet hotkey). Passed through to the
 * LLM layer untouched.
 */
export type SigningCredential = unknown;

export interface CredentialProvider {
    getCredential(): Promise<SigningCredential>;
}

export interface QueryOptions {
    model?: string | undefined;
    maxTokens?: number | undefined;
    temperature?: number | undefined;
    topP?: number | undefined;
    credential?: SigningCredential;
}

/** Function shape consumers depend on instead of the service class */
export type LlmQueryFn = (prompt: string, opts?: QueryOptions) => Promise<string>;

export interface ChatCompletionRequest {
    model: string;
    messages: Message[];
    stream: false;
    max_tokens: number;
    temperature: number;
    top_p: number;
}

export const ChatCompletionResponseSchema = z.object({
    choices: z.array(
        z.object({
            message: z.object({
                content: z.string()
            })
        })
    ).min(1)
});


export class LLMResponseError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'LLMResponseError';
    }
}
