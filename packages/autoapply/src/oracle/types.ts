/**
 * Text-in/text-out reasoning service. Implementations may throw on
 * network or timeout failures; callers own the fallback.
 */
export interface ReasoningOracle {
  readonly name: string;
  call(prompt: string, signal?: AbortSignal): Promise<string>;
}
