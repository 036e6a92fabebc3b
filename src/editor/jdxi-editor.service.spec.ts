import { Test, TestingModule } from '@nestjs/testing';
import { JdxiEditorService } from './jdxi-editor.service';
import { DecodedParameter } from './parameter-edit';
import { AddressResolver } from '../address/address-resolver';
import { SynthType } from '../address/synth-type';
import {
  DEFAULT_DEVICE_IDENTITY,
  DEVICE_IDENTITY,
  JDXI_CONFIG,
  loadJdxiConfig,
} from '../config/device-identity';
import { JdxiSimulatorMidiService } from '../midi/jdxi.simulator.midi.service';
import { MidiService } from '../midi/midi.service';
import { ProgramBankResolver } from '../program/program-bank-resolver';
import { ChannelMessageBuilder } from '../sysex/channel-message-builder';
import {
  InvalidPartialError,
  MessageNotSentError,
  OutOfRangeError,
  UnknownBankError,
} from '../sysex/sysex-errors';
import { toHex } from '../sysex/sysex-constants';
import { SysExMessageBuilder } from '../sysex/sysex-message-builder';
import { SysExParser } from '../sysex/sysex-parser';

const ANALOG = { area: 0x19, part: 0x42, group: 0x00 };
const DRUM_PARTIAL_1 = { area: 0x19, part: 0x70, group: 0x2e };

describe('JdxiEditorService', () => {
  let moduleRef: TestingModule;
  let editor: JdxiEditorService;
  let simulator: JdxiSimulatorMidiService;
  let builder: SysExMessageBuilder;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      providers: [
        { provide: JDXI_CONFIG, useValue: loadJdxiConfig({}) },
        { provide: DEVICE_IDENTITY, useValue: DEFAULT_DEVICE_IDENTITY },
        JdxiSimulatorMidiService,
        { provide: MidiService, useExisting: JdxiSimulatorMidiService },
        AddressResolver,
        ProgramBankResolver,
        SysExMessageBuilder,
        SysExParser,
        ChannelMessageBuilder,
        JdxiEditorService,
      ],
    }).compile();
    await moduleRef.init();

    editor = moduleRef.get(JdxiEditorService);
    simulator = moduleRef.get(JdxiSimulatorMidiService);
    builder = moduleRef.get(SysExMessageBuilder);
    simulator.connectToInputPort(0);
    simulator.connectToOutputPort(0);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('ApplyEdit', () => {
    const message = editor.applyEdit({
      synthType: SynthType.ANALOG,
      parameterId: 'OCTAVE_SHIFT',
      displayValue: 2,
    });

    expect(toHex(message)).toBe('F0 41 10 00 00 00 0E 12 19 42 00 34 42 2F F7');
    expect(simulator.read(ANALOG, 0x34, 1)).toStrictEqual([0x42]);
    expect(editor.parameterState(SynthType.ANALOG)).toStrictEqual({ OCTAVE_SHIFT: 2 });
    expect(editor.parameterState(SynthType.ANALOG, 1)).toStrictEqual({ OCTAVE_SHIFT: 2 });
  });

  it('ApplyEditByDrumPartialName', () => {
    editor.applyEdit({
      synthType: SynthType.DRUMS,
      partialIndex: 'SD1',
      parameterId: 'PARTIAL_LEVEL',
      displayValue: 100,
    });

    expect(simulator.read({ area: 0x19, part: 0x70, group: 0x38 }, 0x0e, 1)).toStrictEqual([100]);
    expect(editor.parameterState(SynthType.DRUMS, 'SD1')).toStrictEqual({ PARTIAL_LEVEL: 100 });
    expect(editor.parameterState(SynthType.DRUMS, 6)).toStrictEqual({ PARTIAL_LEVEL: 100 });
  });

  it('RejectEditWithoutSending', () => {
    const send = jest.spyOn(simulator, 'send');

    expect(() =>
      editor.applyEdit({
        synthType: SynthType.ANALOG,
        parameterId: 'OCTAVE_SHIFT',
        displayValue: 4,
      }),
    ).toThrow(OutOfRangeError);
    expect(() =>
      editor.applyEdit({
        synthType: SynthType.DIGITAL_1,
        partialIndex: 'BD1',
        parameterId: 'OSC_WAVE',
        displayValue: 'SQR',
      }),
    ).toThrow(InvalidPartialError);
    expect(send).not.toHaveBeenCalled();
    expect(editor.parameterState(SynthType.ANALOG)).toStrictEqual({});
  });

  it('KeepStateWhenTheOutputRefuses', () => {
    simulator.midiOutputConnection = null;

    expect(() =>
      editor.applyEdit({
        synthType: SynthType.ANALOG,
        parameterId: 'OCTAVE_SHIFT',
        displayValue: 2,
      }),
    ).toThrow(MessageNotSentError);
    expect(editor.parameterState(SynthType.ANALOG)).toStrictEqual({});
    expect(simulator.read(ANALOG, 0x34, 1)).toStrictEqual([64]);
    expect(() => editor.requestSection(SynthType.ANALOG, 'partial')).toThrow(MessageNotSentError);
    expect(() => editor.selectProgram('G', 64)).toThrow(MessageNotSentError);
    expect(simulator.currentProgram).toStrictEqual({ msb: 85, lsb: 64, pc: 0 });
  });

  it('RequestSectionDecodesTheReply', () => {
    const updates: DecodedParameter[] = [];
    editor.updates$.subscribe((parameter) => updates.push(parameter));

    const request = editor.requestSection(SynthType.DIGITAL_1, 'common');

    expect(toHex(request)).toBe('F0 41 10 00 00 00 0E 11 19 01 00 00 00 00 00 40 26 F7');
    expect(updates).toHaveLength(33);
    const state = editor.parameterState(SynthType.DIGITAL_1);
    expect(state.TONE_NAME_1).toBe(32);
    expect(state.TONE_LEVEL).toBe(0);
    expect(state.PORTAMENTO_SWITCH).toBe('OFF');
  });

  it('RoundTripPartialThroughTheDevice', () => {
    editor.applyEdit({
      synthType: SynthType.DIGITAL_1,
      partialIndex: 2,
      parameterId: 'OSC_WAVE',
      displayValue: 'PCM',
    });
    editor.applyEdit({
      synthType: SynthType.DIGITAL_1,
      partialIndex: 2,
      parameterId: 'PCM_WAVE_NUMBER',
      displayValue: 300,
    });

    expect(simulator.read({ area: 0x19, part: 0x01, group: 0x21 }, 0x35, 4)).toStrictEqual([
      0x00, 0x01, 0x02, 0x0c,
    ]);

    editor.requestSection(SynthType.DIGITAL_1, 'partial', 2);
    const state = editor.parameterState(SynthType.DIGITAL_1, 2);
    expect(state.OSC_WAVE).toBe('PCM');
    expect(state.PCM_WAVE_NUMBER).toBe(300);
    expect(editor.parameterState(SynthType.DIGITAL_1, 1)).toStrictEqual({});
  });

  it('EditDrumPartialPastTheFirstGroup', () => {
    editor.applyEdit({
      synthType: SynthType.DRUMS,
      partialIndex: 1,
      parameterId: 'WMT1_WAVE_SWITCH',
      displayValue: 'ON',
    });
    const message = editor.applyEdit({
      synthType: SynthType.DRUMS,
      partialIndex: 1,
      parameterId: 'TVA_ENV_TIME_1',
      displayValue: 10,
    });

    expect(toHex(message)).toBe('F0 41 10 00 00 00 0E 12 19 70 2F 3A 0A 04 F7');
    expect(simulator.read(DRUM_PARTIAL_1, 0x21, 1)).toStrictEqual([1]);
    expect(simulator.read({ ...DRUM_PARTIAL_1, group: 0x2f }, 0x3a, 1)).toStrictEqual([10]);
    expect(editor.parameterState(SynthType.DRUMS, 1)).toStrictEqual({
      WMT1_WAVE_SWITCH: 'ON',
      TVA_ENV_TIME_1: 10,
    });
  });

  it('ReceiveDrumPartialPastTheFirstGroup', () => {
    const envelope = { ...DRUM_PARTIAL_1, group: 0x2f };
    const decoded = editor.receive(builder.buildDt1(envelope, 0x3a, 0x0a));

    expect(decoded).toEqual([
      {
        synthType: SynthType.DRUMS,
        parameterId: 'TVA_ENV_TIME_1',
        section: 'partial',
        partialIndex: 1,
        raw: 0x0a,
        displayValue: 10,
      },
    ]);
  });

  it('RequestWholeDrumPartial', () => {
    const updates: DecodedParameter[] = [];
    editor.updates$.subscribe((parameter) => updates.push(parameter));

    editor.requestSection(SynthType.DRUMS, 'partial', 1);

    expect(updates).toHaveLength(156);
    const state = editor.parameterState(SynthType.DRUMS, 1);
    expect(state.RELATIVE_LEVEL).toBe(0);
    expect(state.TVA_ENV_TIME_1).toBe(0);
    expect(state.WMT4_WAVE_SWITCH).toBe('OFF');
  });

  it('SelectProgram', () => {
    const selection = editor.selectProgram('g', 64);

    expect(selection.program).toStrictEqual({ bank: 'G', slot: 64 });
    expect(selection.bankProgram).toStrictEqual({ msb: 85, lsb: 1, pc: 63 });
    expect(selection.messages).toHaveLength(8);
    expect(selection.messages.slice(0, 3)).toStrictEqual([
      [0xbf, 0x00, 85],
      [0xbf, 0x20, 1],
      [0xcf, 63],
    ]);
    expect(toHex(selection.messages[3])).toBe(
      'F0 41 10 00 00 00 0E 11 18 00 00 00 00 00 00 40 28 F7',
    );
    expect(simulator.currentProgram).toStrictEqual({ msb: 85, lsb: 1, pc: 63 });
    expect(editor.parameterState(SynthType.ANALOG).OCTAVE_SHIFT).toBe(0);
  });

  it('SelectUnknownProgram', () => {
    expect(() => editor.selectProgram('Z', 1)).toThrow(UnknownBankError);
  });

  it('DiscardInvalidInbound', () => {
    expect(editor.receive([0xf0, 0x41, 0x10, 0xf7])).toStrictEqual([]);
    expect(editor.receive(builder.buildRq1(ANALOG, 0x00, 0x40))).toStrictEqual([]);
    // raw 0x10 is octave -48
    expect(editor.receive(builder.buildDt1(ANALOG, 0x34, 0x10))).toStrictEqual([]);
    // no parameter lives at 0x37
    expect(editor.receive(builder.buildDt1(ANALOG, 0x37, 0x00))).toStrictEqual([]);
    expect(editor.parameterState(SynthType.ANALOG)).toStrictEqual({});
  });

  it('ReceiveDecodesEveryParameterInTheMessage', () => {
    const decoded = editor.receive(builder.buildDt1(ANALOG, 0x34, [0x41, 12]));

    expect(decoded).toEqual([
      {
        synthType: SynthType.ANALOG,
        parameterId: 'OCTAVE_SHIFT',
        section: 'partial',
        raw: 0x41,
        displayValue: 1,
      },
      {
        synthType: SynthType.ANALOG,
        parameterId: 'PITCH_BEND_RANGE_UP',
        section: 'partial',
        raw: 12,
        displayValue: 12,
      },
    ]);
    expect(editor.parameterState(SynthType.ANALOG)).toStrictEqual({
      OCTAVE_SHIFT: 1,
      PITCH_BEND_RANGE_UP: 12,
    });
  });

  it('RequestIdentity', () => {
    expect(editor.deviceInfo()).toBeUndefined();

    expect(editor.requestIdentity()).toStrictEqual([0xf0, 0x7e, 0x10, 0x06, 0x01, 0xf7]);
    const info = editor.deviceInfo();
    expect(info?.isJdxi).toBe(true);
    expect(info?.versionString).toBe('v1.03');
  });
});
