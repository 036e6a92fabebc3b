import { Injectable } from '@nestjs/common';
import { BankProgram } from '../sysex/channel-message-builder';
import { SlotOutOfRangeError, UnknownBankError } from '../sysex/sysex-errors';

export const PROGRAM_BANKS = ['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H'] as const;

export type ProgramBank = (typeof PROGRAM_BANKS)[number];

export interface ProgramIdentity {
  readonly bank: ProgramBank;
  readonly slot: number;
}

export const SLOTS_PER_BANK = 64;
export const PROGRAM_COUNT = PROGRAM_BANKS.length * SLOTS_PER_BANK;

const BANK_SELECT_MSB = 85;

// one LSB per pair of banks: A/B, C/D, E/F, G/H
const BANK_PAIR_LSB: ReadonlyArray<number> = [64, 65, 0, 1];

function isProgramBank(value: string): value is ProgramBank {
  return PROGRAM_BANKS.some((bank) => bank === value);
}

/**
 * Translates between the bank letter and slot shown on the JD-Xi and the
 * bank select / program change values it answers to.
 */
@Injectable()
export class ProgramBankResolver {
  resolve(bank: string, slot: number): BankProgram {
    const bankIndex = this.bankIndex(bank);
    if (!Number.isInteger(slot) || slot < 1 || slot > SLOTS_PER_BANK) {
      throw new SlotOutOfRangeError(
        `slot ${slot} is not between 1 and ${SLOTS_PER_BANK}`,
      );
    }
    const pairIndex = Math.floor(bankIndex / 2);
    const secondOfPair = bankIndex % 2 === 1;

    return {
      msb: BANK_SELECT_MSB,
      lsb: BANK_PAIR_LSB[pairIndex],
      pc: slot - 1 + (secondOfPair ? SLOTS_PER_BANK : 0),
    };
  }

  unresolve(msb: number, lsb: number, pc: number): ProgramIdentity {
    const pairIndex = BANK_PAIR_LSB.indexOf(lsb);
    if (msb !== BANK_SELECT_MSB || pairIndex < 0) {
      throw new UnknownBankError(`msb ${msb} / lsb ${lsb}`);
    }
    if (!Number.isInteger(pc) || pc < 0 || pc > 127) {
      throw new SlotOutOfRangeError(`program change ${pc} is not between 0 and 127`);
    }
    const secondOfPair = pc >= SLOTS_PER_BANK;

    return {
      bank: PROGRAM_BANKS[pairIndex * 2 + (secondOfPair ? 1 : 0)],
      slot: (pc % SLOTS_PER_BANK) + 1,
    };
  }

  /** The program after `bank`/`slot`, wrapping from H64 to A1. */
  next(bank: string, slot: number): ProgramIdentity {
    return this.step(bank, slot, 1);
  }

  previous(bank: string, slot: number): ProgramIdentity {
    return this.step(bank, slot, -1);
  }

  private step(bank: string, slot: number, direction: 1 | -1): ProgramIdentity {
    // validates both values
    this.resolve(bank, slot);
    const position = this.bankIndex(bank) * SLOTS_PER_BANK + (slot - 1);
    const target = (position + direction + PROGRAM_COUNT) % PROGRAM_COUNT;

    return {
      bank: PROGRAM_BANKS[Math.floor(target / SLOTS_PER_BANK)],
      slot: (target % SLOTS_PER_BANK) + 1,
    };
  }

  private bankIndex(bank: string): number {
    const letter = bank.toUpperCase();
    if (!isProgramBank(letter)) {
      throw new UnknownBankError(`bank ${bank}`);
    }
    return PROGRAM_BANKS.indexOf(letter);
  }
}
