import { Injectable } from '@nestjs/common';
import { assertDataByte } from './sysex-message-builder';
import { ByteRangeError } from './sysex-errors';

export enum ChannelStatus {
  NOTE_OFF = 0x80,
  NOTE_ON = 0x90,
  CONTROL_CHANGE = 0xb0,
  PROGRAM_CHANGE = 0xc0,
}

export const BANK_SELECT_MSB = 0x00;
export const BANK_SELECT_LSB = 0x20;

export type ChannelMessage = ReadonlyArray<number>;

export interface BankProgram {
  readonly msb: number;
  readonly lsb: number;
  readonly pc: number;
}

/** Channel voice messages. Channels are numbered 1 to 16. */
@Injectable()
export class ChannelMessageBuilder {
  noteOn(channel: number, note: number, velocity: number): ChannelMessage {
    return this.message(ChannelStatus.NOTE_ON, channel, [
      ['note', note],
      ['velocity', velocity],
    ]);
  }

  noteOff(channel: number, note: number, velocity = 0): ChannelMessage {
    return this.message(ChannelStatus.NOTE_OFF, channel, [
      ['note', note],
      ['velocity', velocity],
    ]);
  }

  controlChange(channel: number, controller: number, value: number): ChannelMessage {
    return this.message(ChannelStatus.CONTROL_CHANGE, channel, [
      ['controller', controller],
      ['value', value],
    ]);
  }

  programChange(channel: number, program: number): ChannelMessage {
    return this.message(ChannelStatus.PROGRAM_CHANGE, channel, [
      ['program', program],
    ]);
  }

  /** Bank select MSB, then LSB, then the program change. */
  bankSelectAndProgramChange(
    channel: number,
    program: BankProgram,
  ): ChannelMessage[] {
    return [
      this.controlChange(channel, BANK_SELECT_MSB, program.msb),
      this.controlChange(channel, BANK_SELECT_LSB, program.lsb),
      this.programChange(channel, program.pc),
    ];
  }

  private message(
    status: ChannelStatus,
    channel: number,
    data: ReadonlyArray<[string, number]>,
  ): ChannelMessage {
    if (!Number.isInteger(channel) || channel < 1 || channel > 16) {
      throw new ByteRangeError(
        'channel',
        channel,
        16,
        `channel must be an integer between 1 and 16, got ${channel}`,
      );
    }
    data.forEach(([field, value]) => assertDataByte(field, value));
    return [status | (channel - 1), ...data.map(([, value]) => value)];
  }
}
