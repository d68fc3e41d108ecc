import type {
  BackendClient,
  PollResult,
  SubmissionRequest,
  SubmitResult
} from "../../src/backends/types.js";
import type { ChatDelivery } from "../../src/chat/types.js";
import type { BackendKind, BuildStatus } from "../../src/workflow/model.js";

export type PollStep = BuildStatus | Error;

/**
 * 可编排的后端：按 reference 预设轮询序列，序列用完后一直返回最后一项
 */
export class FakeBackendClient implements BackendClient {
  readonly submits: SubmissionRequest[] = [];
  readonly polls: string[] = [];
  private readonly scripts = new Map<string, PollStep[]>();
  private submitHandler: (request: SubmissionRequest) => Promise<SubmitResult>;

  constructor(readonly kind: BackendKind) {
    this.submitHandler = async (request) => ({ reference: `${kind}-${request.service}` });
  }

  onSubmit(handler: (request: SubmissionRequest) => Promise<SubmitResult>): this {
    this.submitHandler = handler;
    return this;
  }

  script(reference: string, steps: PollStep[]): this {
    this.scripts.set(reference, [...steps]);
    return this;
  }

  async submit(request: SubmissionRequest): Promise<SubmitResult> {
    this.submits.push(request);
    return this.submitHandler(request);
  }

  async pollStatus(reference: string): Promise<PollResult> {
    this.polls.push(reference);
    const steps = this.scripts.get(reference) ?? [];
    const step = steps.length > 1 ? steps.shift() : steps[0];
    if (step === undefined) {
      return { status: "Pending" };
    }
    if (step instanceof Error) {
      throw step;
    }
    return { status: step };
  }
}

export interface SentMessage {
  chatId: string;
  text: string;
  mentions: readonly string[];
}

export interface UpdatedMessage {
  chatId: string;
  messageId: string;
  text: string;
}

export class RecordingChat implements ChatDelivery {
  readonly sent: SentMessage[] = [];
  readonly updated: UpdatedMessage[] = [];
  failSends = false;

  async sendMessage(chatId: string, text: string, mentions: readonly string[] = []): Promise<void> {
    if (this.failSends) {
      throw new Error("chat unavailable");
    }
    this.sent.push({ chatId, text, mentions });
  }

  async updateMessage(chatId: string, messageId: string, text: string): Promise<void> {
    this.updated.push({ chatId, messageId, text });
  }
}
