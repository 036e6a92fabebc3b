import { ChannelMessageBuilder } from './channel-message-builder';
import { ByteRangeError } from './sysex-errors';

describe('ChannelMessageBuilder', () => {
  it('BuildNoteMessages', () => {
    const builder = new ChannelMessageBuilder();

    expect(builder.noteOn(1, 60, 100)).toStrictEqual([0x90, 60, 100]);
    expect(builder.noteOff(10, 36)).toStrictEqual([0x89, 36, 0]);
  });

  it('BuildControlAndProgramChange', () => {
    const builder = new ChannelMessageBuilder();

    expect(builder.controlChange(16, 7, 127)).toStrictEqual([0xbf, 7, 127]);
    expect(builder.programChange(16, 63)).toStrictEqual([0xcf, 63]);
  });

  it('BuildBankSelectInOrder', () => {
    const builder = new ChannelMessageBuilder();

    expect(
      builder.bankSelectAndProgramChange(16, { msb: 85, lsb: 1, pc: 63 }),
    ).toStrictEqual([
      [0xbf, 0x00, 85],
      [0xbf, 0x20, 1],
      [0xcf, 63],
    ]);
  });

  it('RejectOutOfRangeValues', () => {
    const builder = new ChannelMessageBuilder();

    expect(() => builder.noteOn(0, 60, 100)).toThrow(ByteRangeError);
    expect(() => builder.noteOn(17, 60, 100)).toThrow(ByteRangeError);
    expect(() => builder.noteOn(1, 128, 100)).toThrow(ByteRangeError);
    expect(() => builder.programChange(1, -1)).toThrow(ByteRangeError);
    expect(() =>
      builder.bankSelectAndProgramChange(16, { msb: 85, lsb: 64, pc: 128 }),
    ).toThrow(ByteRangeError);
  });
});
