import { Logger } from '@nestjs/common';
import { JdxiSimulatorMidiService } from './jdxi.simulator.midi.service';
import { AddressResolver } from '../address/address-resolver';
import { DEFAULT_DEVICE_IDENTITY } from '../config/device-identity';
import { SysExMessageBuilder } from '../sysex/sysex-message-builder';
import { SysExParser } from '../sysex/sysex-parser';

const ANALOG = { area: 0x19, part: 0x42, group: 0x00 };
const PROGRAM_COMMON = { area: 0x18, part: 0x00, group: 0x00 };

function createSimulator(): JdxiSimulatorMidiService {
  return new JdxiSimulatorMidiService(
    new SysExParser(DEFAULT_DEVICE_IDENTITY),
    new SysExMessageBuilder(DEFAULT_DEVICE_IDENTITY),
    new AddressResolver(),
    DEFAULT_DEVICE_IDENTITY,
  );
}

describe('JdxiSimulatorMidiService', () => {
  it('ListAndConnectPorts', () => {
    const simulator = createSimulator();

    expect(simulator.getMidiInputPorts()).toStrictEqual([
      { id: 0, name: 'JD-Xi' },
      { id: 1, name: 'JD-Xi DAW CTRL' },
    ]);
    expect(simulator.getMidiConnections()).toStrictEqual([]);
    expect(simulator.connectToInputPort(2)).toBe(false);
    expect(simulator.connectToInputPort(0)).toBe(true);
    expect(simulator.connectToOutputPort(1)).toBe(true);
    expect(simulator.getMidiConnections()).toStrictEqual([
      { id: 0, name: 'JD-Xi', is_input: true },
      { id: 1, name: 'JD-Xi DAW CTRL', is_input: false },
    ]);
  });

  it('StartWithNeutralValues', () => {
    const simulator = createSimulator();

    // OCTAVE_SHIFT sits at its center, names are blank
    expect(simulator.read(ANALOG, 0x34, 1)).toStrictEqual([64]);
    expect(simulator.read(PROGRAM_COMMON, 0x00, 2)).toStrictEqual([32, 32]);
    expect(simulator.read({ area: 0x19, part: 0x70, group: 0x76 }, 0x12, 1)).toStrictEqual([
      64,
    ]);
    // gaps between parameters read as zero
    expect(simulator.read(ANALOG, 0x37, 1)).toStrictEqual([0]);
  });

  it('RefuseToSendWithoutOutputPort', () => {
    const simulator = createSimulator();
    const builder = new SysExMessageBuilder(DEFAULT_DEVICE_IDENTITY);

    expect(simulator.send(builder.buildDt1(ANALOG, 0x34, 0x42))).toBe(false);
    expect(simulator.read(ANALOG, 0x34, 1)).toStrictEqual([64]);
  });

  it('WriteDt1AndAnswerRq1', () => {
    const simulator = createSimulator();
    const builder = new SysExMessageBuilder(DEFAULT_DEVICE_IDENTITY);
    const received: Array<ReadonlyArray<number>> = [];
    simulator.incoming$.subscribe((bytes) => received.push(bytes));
    simulator.connectToInputPort(0);
    simulator.connectToOutputPort(0);

    expect(simulator.send(builder.buildDt1(ANALOG, 0x34, 0x42))).toBe(true);
    expect(simulator.read(ANALOG, 0x34, 1)).toStrictEqual([0x42]);
    expect(received).toHaveLength(0);

    simulator.send(builder.buildRq1(ANALOG, 0x33, 3));
    expect(received).toStrictEqual([builder.buildDt1(ANALOG, 0x33, [0, 0x42, 0])]);
  });

  it('ClampLongDumpRequests', () => {
    const simulator = createSimulator();
    const builder = new SysExMessageBuilder(DEFAULT_DEVICE_IDENTITY);
    const debug = jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    const received: Array<ReadonlyArray<number>> = [];
    simulator.incoming$.subscribe((bytes) => received.push(bytes));
    simulator.connectToInputPort(0);
    simulator.connectToOutputPort(0);

    simulator.send(builder.buildRq1(PROGRAM_COMMON, 0x00, 0x300));

    expect(received).toHaveLength(1);
    // header, command, address, offset, 0x200 data bytes, checksum, F7
    expect(received[0]).toHaveLength(0x200 + 14);
    expect(debug).toHaveBeenCalledWith('RQ1 asked for 768 bytes, answering the first 512');
    debug.mockRestore();
  });

  it('DropRepliesWithoutInputPort', () => {
    const simulator = createSimulator();
    const builder = new SysExMessageBuilder(DEFAULT_DEVICE_IDENTITY);
    const received: Array<ReadonlyArray<number>> = [];
    simulator.incoming$.subscribe((bytes) => received.push(bytes));
    simulator.connectToOutputPort(0);

    simulator.send(builder.buildRq1(PROGRAM_COMMON, 0x00, 0x40));
    expect(received).toHaveLength(0);
  });

  it('AnswerIdentityRequest', () => {
    const simulator = createSimulator();
    const builder = new SysExMessageBuilder(DEFAULT_DEVICE_IDENTITY);
    const received: Array<ReadonlyArray<number>> = [];
    simulator.incoming$.subscribe((bytes) => received.push(bytes));
    simulator.connectToInputPort(0);
    simulator.connectToOutputPort(0);

    simulator.send(builder.buildIdentityRequest());
    expect(received).toStrictEqual([
      [
        0xf0, 0x7e, 0x10, 0x06, 0x02, 0x41, 0x0e, 0x03, 0x00, 0x00, 0x01, 0x03,
        0x00, 0x00, 0xf7,
      ],
    ]);
  });

  it('FollowBankSelectAndProgramChange', () => {
    const simulator = createSimulator();
    simulator.connectToOutputPort(0);

    simulator.send([0xbf, 0x00, 85]);
    simulator.send([0xbf, 0x20, 1]);
    simulator.send([0xcf, 63]);
    expect(simulator.currentProgram).toStrictEqual({ msb: 85, lsb: 1, pc: 63 });
  });

  it('IgnoreInvalidMessages', () => {
    const simulator = createSimulator();
    simulator.connectToOutputPort(0);

    // wrong checksum
    expect(
      simulator.send([
        0xf0, 0x41, 0x10, 0x00, 0x00, 0x00, 0x0e, 0x12, 0x19, 0x42, 0x00, 0x34, 0x42,
        0x00, 0xf7,
      ]),
    ).toBe(true);
    expect(simulator.read(ANALOG, 0x34, 1)).toStrictEqual([64]);
  });
});
