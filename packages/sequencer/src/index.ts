import { Sequencer, SequencerConfig, Validator } from "@tillchain/core";

export interface SoloConfig {
  validator: Validator;
}

/** One validator proposes every block. */
export class SoloSequencer implements Sequencer {
  readonly type = "solo";
  private validator: Validator;

  constructor(cfg: SoloConfig) {
    this.validator = cfg.validator;
  }

  getProposer(_height: number): Validator {
    return this.validator;
  }

  isProposer(pubKey: string, _height: number): boolean {
    return pubKey === this.validator.pubKey;
  }

  validators(): Validator[] {
    return [this.validator];
  }
}

export interface RoundRobinConfig {
  validators: Validator[];
}

/** Validators take turns in list order, starting with the first at height 1. */
export class RoundRobinSequencer implements Sequencer {
  readonly type = "round-robin";
  private readonly list: Validator[];

  constructor(cfg: RoundRobinConfig) {
    if (!cfg.validators.length) {
      throw new Error("Round-robin sequencing requires at least one validator");
    }
    this.list = [...cfg.validators];
  }

  getProposer(height: number): Validator {
    if (!Number.isInteger(height) || height < 1) {
      throw new Error(`No proposer for height ${height}`);
    }
    return this.list[(height - 1) % this.list.length];
  }

  isProposer(pubKey: string, height: number): boolean {
    return this.getProposer(height).pubKey === pubKey;
  }

  validators(): Validator[] {
    return [...this.list];
  }
}

export function createSequencer(cfg: SequencerConfig): Sequencer {
  switch (cfg.type) {
    case "solo":
      return new SoloSequencer({ validator: cfg.validators[0] });
    case "round-robin":
      return new RoundRobinSequencer({ validators: cfg.validators });
  }
}
