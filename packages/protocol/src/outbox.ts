/**
 * InMemoryOutbox — in-process custody and transport.
 *
 * Records every instruction and hands out sequential identifiers
 * ("msg-1", "msg-2", ...). Instructions are staged until commit(); a
 * discard() drops them and hands their identifiers out again. Nothing is
 * delivered anywhere; replies are fed back by whoever drives the protocol
 * (tests, the relayer endpoint).
 */

import type { Amount, Identity, MessageId } from "@bondline/types";
import type {
  CrossChainTransferRequest,
  CrossChainTransport,
  TokenCustody,
} from "./types.js";
import { ProtocolError } from "./types.js";

export type OutboxInstructionType = "mint" | "burn" | "transfer" | "cross-chain";

export interface OutboxInstruction {
  readonly id: MessageId;
  readonly type: OutboxInstructionType;
  readonly denom: string;
  readonly amount: Amount;
  /** Recipient, burn source, or remote destination. */
  readonly counterparty: Identity;
  readonly memo?: string | undefined;
}

export class InMemoryOutbox implements TokenCustody, CrossChainTransport {
  private readonly recorded: OutboxInstruction[] = [];
  private staged: OutboxInstruction[] = [];
  private counter = 0;
  private rejection: { reason: string; type: OutboxInstructionType | undefined } | undefined;
  private readonly prefix: string;

  constructor(prefix = "msg") {
    this.prefix = prefix;
  }

  mint(denom: string, amount: Amount, recipient: Identity): MessageId {
    return this.emit({ type: "mint", denom, amount, counterparty: recipient });
  }

  burn(denom: string, amount: Amount, source: Identity): MessageId {
    return this.emit({ type: "burn", denom, amount, counterparty: source });
  }

  transfer(denom: string, amount: Amount, recipient: Identity): MessageId {
    return this.emit({ type: "transfer", denom, amount, counterparty: recipient });
  }

  sendTransfer(request: CrossChainTransferRequest): MessageId {
    return this.emit({
      type: "cross-chain",
      denom: request.denom,
      amount: request.amount,
      counterparty: request.destination,
      memo: request.memo,
    });
  }

  commit(): void {
    this.recorded.push(...this.staged);
    this.staged = [];
  }

  discard(): void {
    this.counter -= this.staged.length;
    this.staged = [];
  }

  /** Committed instructions, in order. */
  get instructions(): readonly OutboxInstruction[] {
    return [...this.recorded];
  }

  get last(): OutboxInstruction | undefined {
    return this.recorded[this.recorded.length - 1];
  }

  /** Staged since the last commit or discard. */
  get pending(): readonly OutboxInstruction[] {
    return [...this.staged];
  }

  /**
   * Make the next emission throw DISPATCH_FAILED. With a type, emissions of
   * other types pass until one of that type is attempted.
   */
  rejectNext(reason: string, type?: OutboxInstructionType): void {
    this.rejection = { reason, type };
  }

  private emit(instruction: Omit<OutboxInstruction, "id">): MessageId {
    const rejection = this.rejection;
    if (rejection !== undefined && (rejection.type === undefined || rejection.type === instruction.type)) {
      this.rejection = undefined;
      throw new ProtocolError(
        "DISPATCH_FAILED",
        `Could not emit ${instruction.type} of ${instruction.amount.toString()} ${instruction.denom}: ${rejection.reason}`,
      );
    }

    this.counter++;
    const id = `${this.prefix}-${String(this.counter)}`;
    this.staged.push({ ...instruction, id });
    return id;
  }
}
