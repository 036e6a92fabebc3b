import { Inject, Injectable, Logger } from '@nestjs/common';
import { Subject } from 'rxjs';
import { MidiConnection, MidiPort, MidiService } from './midi.service';
import { AddressResolver } from '../address/address-resolver';
import { AddressTriple, SYNTH_TYPES, SYNTH_TYPE_LAYOUTS } from '../address/synth-type';
import { DEVICE_IDENTITY, DeviceIdentity } from '../config/device-identity';
import { ParameterValueMapper } from '../mappers/parameter-value-mapper';
import { DEFAULT_CENTER, ParameterSpec } from '../parameters/parameter-spec';
import {
  BANK_SELECT_LSB,
  BANK_SELECT_MSB,
  BankProgram,
  ChannelStatus,
} from '../sysex/channel-message-builder';
import {
  END_OF_SYSEX,
  GENERAL_INFORMATION,
  IDENTITY_REPLY,
  IDENTITY_REQUEST,
  JDXI_FAMILY_CODE,
  START_OF_SYSEX,
  UNIVERSAL_NON_REALTIME,
  toHex,
} from '../sysex/sysex-constants';
import { SysExMessageBuilder } from '../sysex/sysex-message-builder';
import { SysExParser, valueBytes } from '../sysex/sysex-parser';

// largest dump answered for a single RQ1
const MAX_DUMP_LENGTH = 0x200;
const BROADCAST_DEVICE_ID = 0x7f;
const FIRMWARE_VERSION = [0x01, 0x03, 0x00, 0x00];

function linearAddress(address: AddressTriple, offset: number): number {
  return ((address.area * 128 + address.part) * 128 + address.group) * 128 + offset;
}

function neutralRaw(spec: ParameterSpec): number {
  return spec.encoding === 'signed_offset'
    ? (spec.center ?? DEFAULT_CENTER)
    : spec.rawMin;
}

/**
 * In-memory JD-Xi. DT1 messages write its temporary areas, RQ1 messages are
 * answered with a DT1 dump and bank select / program change move the
 * current program.
 */
@Injectable()
export class JdxiSimulatorMidiService extends MidiService {
  private readonly logger = new Logger(JdxiSimulatorMidiService.name);
  private readonly incoming = new Subject<ReadonlyArray<number>>();
  readonly incoming$ = this.incoming.asObservable();

  // midi
  midiInputPorts = ['JD-Xi', 'JD-Xi DAW CTRL'];
  midiInputConnection: number | null = null;
  midiOutputPorts = ['JD-Xi', 'JD-Xi DAW CTRL'];
  midiOutputConnection: number | null = null;

  // sparse memory keyed by the 28-bit address; unwritten bytes read as 0
  memory = new Map<number, number>();
  bankSelect = { msb: 85, lsb: 64 };
  currentProgram: BankProgram = { msb: 85, lsb: 64, pc: 0 };

  constructor(
    private readonly parser: SysExParser,
    private readonly builder: SysExMessageBuilder,
    private readonly resolver: AddressResolver,
    @Inject(DEVICE_IDENTITY) private readonly identity: DeviceIdentity,
  ) {
    super();

    // build the simulator data
    this.initialiseTemporaryAreas(new ParameterValueMapper());
  }

  getMidiInputPorts(): Array<MidiPort> {
    return this.midiInputPorts.map((name, id) => ({ id, name }));
  }

  getMidiOutputPorts(): Array<MidiPort> {
    return this.midiOutputPorts.map((name, id) => ({ id, name }));
  }

  getMidiConnections(): Array<MidiConnection> {
    const connections: Array<MidiConnection> = [];

    if (this.midiInputConnection !== null) {
      connections.push({
        id: this.midiInputConnection,
        name: this.midiInputPorts[this.midiInputConnection],
        is_input: true,
      });
    }

    if (this.midiOutputConnection !== null) {
      connections.push({
        id: this.midiOutputConnection,
        name: this.midiOutputPorts[this.midiOutputConnection],
        is_input: false,
      });
    }

    return connections;
  }

  connectToInputPort(id: number): boolean {
    if (Number.isInteger(id) && id >= 0 && id < this.midiInputPorts.length) {
      this.midiInputConnection = id;
      return true;
    }

    return false;
  }

  connectToOutputPort(id: number): boolean {
    if (Number.isInteger(id) && id >= 0 && id < this.midiOutputPorts.length) {
      this.midiOutputConnection = id;
      return true;
    }

    return false;
  }

  send(bytes: ReadonlyArray<number>): boolean {
    if (this.midiOutputConnection === null) {
      this.logger.warn('No output port connected, message not sent');
      return false;
    }
    if (bytes.length === 0) {
      return true;
    }

    const status = bytes[0];
    if (status === START_OF_SYSEX) {
      this.receiveSysEx(bytes);
    } else if (status >= ChannelStatus.NOTE_OFF && status < START_OF_SYSEX) {
      this.receiveChannelMessage(bytes);
    } else {
      this.logger.warn(`Ignoring ${toHex(bytes)}`);
    }
    return true;
  }

  read(address: AddressTriple, offset: number, length: number): number[] {
    const start = linearAddress(address, offset);
    return Array.from(
      { length },
      (_, index) => this.memory.get(start + index) ?? 0,
    );
  }

  write(address: AddressTriple, offset: number, data: ReadonlyArray<number>): void {
    const start = linearAddress(address, offset);
    data.forEach((value, index) => this.memory.set(start + index, value));
  }

  private receiveSysEx(bytes: ReadonlyArray<number>): void {
    if (bytes[1] === UNIVERSAL_NON_REALTIME) {
      this.receiveUniversalMessage(bytes);
      return;
    }

    const result = this.parser.parse(bytes);
    if (!result.ok) {
      this.logger.warn(`Ignoring ${toHex(bytes)}: ${result.error.message}`);
      return;
    }

    const message = result.message;
    if (message.command === 'DT1') {
      this.write(message.address, message.offset, valueBytes(message));
      return;
    }

    const length = Math.min(message.length, MAX_DUMP_LENGTH);
    if (length < message.length) {
      this.logger.debug(
        `RQ1 asked for ${message.length} bytes, answering the first ${length}`,
      );
    }
    if (length === 0) {
      return;
    }
    this.reply(
      this.builder.buildDt1(
        message.address,
        message.offset,
        this.read(message.address, message.offset, length),
      ),
    );
  }

  private receiveUniversalMessage(bytes: ReadonlyArray<number>): void {
    const isIdentityRequest =
      bytes.length === 6 &&
      (bytes[2] === this.identity.deviceId || bytes[2] === BROADCAST_DEVICE_ID) &&
      bytes[3] === GENERAL_INFORMATION &&
      bytes[4] === IDENTITY_REQUEST &&
      bytes[5] === END_OF_SYSEX;
    if (!isIdentityRequest) {
      this.logger.warn(`Ignoring ${toHex(bytes)}`);
      return;
    }

    this.reply([
      START_OF_SYSEX,
      UNIVERSAL_NON_REALTIME,
      this.identity.deviceId,
      GENERAL_INFORMATION,
      IDENTITY_REPLY,
      this.identity.manufacturerId,
      ...JDXI_FAMILY_CODE,
      0x00,
      0x00,
      ...FIRMWARE_VERSION,
      END_OF_SYSEX,
    ]);
  }

  private receiveChannelMessage(bytes: ReadonlyArray<number>): void {
    const type = bytes[0] & 0xf0;

    if (type === ChannelStatus.CONTROL_CHANGE && bytes.length === 3) {
      if (bytes[1] === BANK_SELECT_MSB) {
        this.bankSelect.msb = bytes[2];
      } else if (bytes[1] === BANK_SELECT_LSB) {
        this.bankSelect.lsb = bytes[2];
      }
      return;
    }

    if (type === ChannelStatus.PROGRAM_CHANGE && bytes.length === 2) {
      this.currentProgram = { ...this.bankSelect, pc: bytes[1] };
      const { msb, lsb, pc } = this.currentProgram;
      this.logger.log(`Program changed to msb ${msb} lsb ${lsb} pc ${pc}`);
    }
  }

  private reply(bytes: ReadonlyArray<number>): void {
    if (this.midiInputConnection === null) {
      this.logger.debug(`No input port connected, dropping ${toHex(bytes)}`);
      return;
    }
    this.incoming.next(bytes);
  }

  private initialiseTemporaryAreas(mapper: ParameterValueMapper): void {
    for (const synthType of SYNTH_TYPES) {
      const layout = SYNTH_TYPE_LAYOUTS[synthType];

      for (const section of layout.sections) {
        const partials: Array<number | undefined> = [];
        if (section === 'partial' && layout.partials && !layout.partials.implicit) {
          for (let index = layout.partials.min; index <= layout.partials.max; index++) {
            partials.push(index);
          }
        } else {
          partials.push(undefined);
        }

        for (const partialIndex of partials) {
          const { address, size } = this.resolver.sectionAddress(
            synthType,
            section,
            partialIndex,
          );
          for (const { spec, index } of this.resolver.lookupSpan(address, 0, size)) {
            this.write(address, index, mapper.toBytes(spec, neutralRaw(spec)));
          }
        }
      }
    }
  }
}
