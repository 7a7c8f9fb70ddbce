/**
 * Offline completion provider
 *
 * Without a responder it answers equivalence checks with "NO" (the
 * conservative answer) and generation prompts by echoing the first
 * evidence line, which by construction is fully backed by evidence.
 */

import type { CompletionProvider, CompletionRequest } from "@/types";
import { MOCK_COMPLETION_PROVIDER_NAME } from "@/constants";

export type CompletionResponder = (req: CompletionRequest) => string | Promise<string>;

const EVIDENCE_LINE_PATTERN = /^- (.+)$/m;

function defaultResponder(req: CompletionRequest): string {
  if (req.temperature === 0) {
    return "NO";
  }
  const evidence = EVIDENCE_LINE_PATTERN.exec(req.prompt);
  return evidence ? evidence[1] : "";
}

export class MockCompletionProvider implements CompletionProvider {
  public readonly name = MOCK_COMPLETION_PROVIDER_NAME;
  private readonly responder: CompletionResponder;
  private readonly calls: CompletionRequest[] = [];

  constructor(responder: CompletionResponder = defaultResponder) {
    this.responder = responder;
  }

  async complete(req: CompletionRequest): Promise<string> {
    this.calls.push(req);
    return this.responder(req);
  }

  /** Requests received so far, oldest first */
  getCalls(): CompletionRequest[] {
    return [...this.calls];
  }
}
