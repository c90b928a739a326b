/**
 * AdminRegistry — ownership and the validator list.
 *
 * Ownership moves in two steps: the owner nominates a successor, who
 * must accept. Until then the owner may revoke or overwrite the
 * nomination.
 */

import type { Identity } from "@bondline/types";
import type { IdentityValidator } from "./types.js";
import { ProtocolError } from "./types.js";

export interface AdminState {
  readonly owner: Identity;
  readonly pendingOwner?: Identity | undefined;
  readonly validators: readonly Identity[];
}

export class AdminRegistry {
  private state: AdminState;
  private readonly identity: IdentityValidator;

  constructor(initial: AdminState, identity: IdentityValidator) {
    this.identity = identity;
    this.state = AdminRegistry.checked(initial, identity);
  }

  get owner(): Identity {
    return this.state.owner;
  }

  get pendingOwner(): Identity | undefined {
    return this.state.pendingOwner;
  }

  get validators(): readonly Identity[] {
    return this.state.validators;
  }

  isOwner(sender: Identity): boolean {
    return sender === this.state.owner;
  }

  requireOwner(sender: Identity, action: string): void {
    if (!this.isOwner(sender)) {
      throw new ProtocolError("UNAUTHORIZED", `Only the owner may ${action}`);
    }
  }

  // ─── Ownership ────────────────────────────────────────────────────────

  transferOwnership(sender: Identity, newOwner: Identity): AdminState {
    this.requireOwner(sender, "transfer ownership");
    this.assertIdentity(newOwner);
    this.state = { ...this.state, pendingOwner: newOwner };
    return this.state;
  }

  revokeOwnershipTransfer(sender: Identity): AdminState {
    this.requireOwner(sender, "revoke an ownership transfer");
    if (this.state.pendingOwner === undefined) {
      throw new ProtocolError("NO_PENDING_OWNER", "No ownership transfer is pending");
    }
    this.state = { ...this.state, pendingOwner: undefined };
    return this.state;
  }

  acceptOwnership(sender: Identity): AdminState {
    const pending = this.state.pendingOwner;
    if (pending === undefined) {
      throw new ProtocolError("NO_PENDING_OWNER", "No ownership transfer is pending");
    }
    if (sender !== pending) {
      throw new ProtocolError("UNAUTHORIZED", "Only the nominated owner may accept ownership");
    }
    this.state = { ...this.state, owner: pending, pendingOwner: undefined };
    return this.state;
  }

  // ─── Validators ───────────────────────────────────────────────────────

  addValidator(sender: Identity, validator: Identity): AdminState {
    this.requireOwner(sender, "add validators");
    this.assertIdentity(validator);
    if (this.state.validators.includes(validator)) {
      throw new ProtocolError("DUPLICATE_VALIDATOR", `Validator '${validator}' is already registered`);
    }
    this.state = { ...this.state, validators: [...this.state.validators, validator] };
    return this.state;
  }

  removeValidator(sender: Identity, validator: Identity): AdminState {
    this.requireOwner(sender, "remove validators");
    if (!this.state.validators.includes(validator)) {
      throw new ProtocolError("VALIDATOR_NOT_FOUND", `Validator '${validator}' is not registered`);
    }
    this.state = {
      ...this.state,
      validators: this.state.validators.filter((v) => v !== validator),
    };
    return this.state;
  }

  // ─── Export ───────────────────────────────────────────────────────────

  export(): AdminState {
    return this.state;
  }

  import(state: AdminState): void {
    this.state = AdminRegistry.checked(state, this.identity);
  }

  private assertIdentity(identity: string): void {
    if (!this.identity.validate(identity)) {
      throw new ProtocolError("INVALID_IDENTITY", `Invalid identity: '${identity}'`);
    }
  }

  private static checked(state: AdminState, identity: IdentityValidator): AdminState {
    const all = [state.owner, ...state.validators];
    if (state.pendingOwner !== undefined) all.push(state.pendingOwner);
    for (const id of all) {
      if (!identity.validate(id)) {
        throw new ProtocolError("INVALID_IDENTITY", `Invalid identity: '${id}'`);
      }
    }
    if (new Set(state.validators).size !== state.validators.length) {
      throw new ProtocolError("DUPLICATE_VALIDATOR", "Validator list contains duplicates");
    }
    return state;
  }
}
