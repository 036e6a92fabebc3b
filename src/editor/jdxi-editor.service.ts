import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { Observable, Subject, Subscription } from 'rxjs';
import { DecodedParameter, ParameterEdit } from './parameter-edit';
import { AddressResolver } from '../address/address-resolver';
import { SynthType } from '../address/synth-type';
import { JDXI_CONFIG, JdxiConfig } from '../config/device-identity';
import { ParameterValueMapper } from '../mappers/parameter-value-mapper';
import { MidiService } from '../midi/midi.service';
import { DisplayValue, ParameterSection } from '../parameters/parameter-spec';
import {
  ProgramBankResolver,
  ProgramIdentity,
} from '../program/program-bank-resolver';
import {
  BankProgram,
  ChannelMessage,
  ChannelMessageBuilder,
} from '../sysex/channel-message-builder';
import { DeviceInfo, describeDevice } from '../sysex/device-info';
import {
  InvalidPartialError,
  JdxiProtocolError,
  MessageNotSentError,
} from '../sysex/sysex-errors';
import { UNIVERSAL_NON_REALTIME, toHex } from '../sysex/sysex-constants';
import { SysExMessage, SysExMessageBuilder } from '../sysex/sysex-message-builder';
import { SysExParser, valueBytes } from '../sysex/sysex-parser';

export interface ProgramSelection {
  readonly program: ProgramIdentity;
  readonly bankProgram: BankProgram;
  readonly messages: ReadonlyArray<ChannelMessage | SysExMessage>;
}

// sections requested after a program change, in this order
const PROGRAM_DUMP_SECTIONS: ReadonlyArray<[SynthType, ParameterSection]> = [
  [SynthType.PROGRAM, 'common'],
  [SynthType.DIGITAL_1, 'common'],
  [SynthType.DIGITAL_2, 'common'],
  [SynthType.ANALOG, 'partial'],
  [SynthType.DRUMS, 'common'],
];

function stateKey(synthType: SynthType, partialIndex?: number): string {
  return `${synthType}:${partialIndex ?? '-'}`;
}

/**
 * Single entry point for editing the JD-Xi: turns parameter edits into DT1
 * messages and keeps the last known value of every parameter the device
 * reported.
 */
@Injectable()
export class JdxiEditorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(JdxiEditorService.name);
  private readonly mapper = new ParameterValueMapper();
  private readonly state = new Map<string, Map<string, DisplayValue>>();
  private readonly updates = new Subject<DecodedParameter>();
  private subscription?: Subscription;
  private device?: DeviceInfo;

  readonly updates$: Observable<DecodedParameter> = this.updates.asObservable();

  constructor(
    private readonly midiService: MidiService,
    private readonly addressResolver: AddressResolver,
    private readonly bankResolver: ProgramBankResolver,
    private readonly sysExBuilder: SysExMessageBuilder,
    private readonly sysExParser: SysExParser,
    private readonly channelBuilder: ChannelMessageBuilder,
    @Inject(JDXI_CONFIG) private readonly config: JdxiConfig,
  ) {}

  onModuleInit(): void {
    this.subscription = this.midiService.incoming$.subscribe((bytes) =>
      this.receive(bytes),
    );
  }

  onModuleDestroy(): void {
    this.subscription?.unsubscribe();
    this.updates.complete();
  }

  applyEdit(edit: ParameterEdit): SysExMessage {
    const partialIndex = this.partialIndex(edit.synthType, edit.partialIndex);
    const resolved = this.addressResolver.resolve(
      edit.synthType,
      partialIndex,
      edit.parameterId,
    );
    const raw = this.mapper.toRaw(resolved.spec, edit.displayValue);
    const message = this.sysExBuilder.buildDt1(
      resolved.address,
      resolved.offset,
      this.mapper.toBytes(resolved.spec, raw),
    );

    this.transmit(message);
    this.remember(
      edit.synthType,
      resolved.partialIndex,
      resolved.spec.id,
      this.mapper.toDisplay(resolved.spec, raw),
    );
    return message;
  }

  requestSection(
    synthType: SynthType,
    section: ParameterSection,
    partialIndex?: number | string,
  ): SysExMessage {
    const { address, size } = this.addressResolver.sectionAddress(
      synthType,
      section,
      this.partialIndex(synthType, partialIndex),
    );
    const message = this.sysExBuilder.buildRq1(address, 0x00, size);

    this.transmit(message);
    return message;
  }

  requestIdentity(): SysExMessage {
    const message = this.sysExBuilder.buildIdentityRequest();

    this.transmit(message);
    return message;
  }

  selectProgram(bank: string, slot: number): ProgramSelection {
    const bankProgram = this.bankResolver.resolve(bank, slot);
    const program = this.bankResolver.unresolve(
      bankProgram.msb,
      bankProgram.lsb,
      bankProgram.pc,
    );
    const messages: Array<ChannelMessage | SysExMessage> =
      this.channelBuilder.bankSelectAndProgramChange(
        this.config.programChannel,
        bankProgram,
      );

    this.logger.log(
      `Selecting program ${program.bank}${program.slot} on channel ${this.config.programChannel}`,
    );
    messages.forEach((message) => this.transmit(message));
    PROGRAM_DUMP_SECTIONS.forEach(([synthType, section]) =>
      messages.push(this.requestSection(synthType, section)),
    );

    return { program, bankProgram, messages };
  }

  /**
   * Decodes an inbound message and records every parameter it carries.
   * Malformed messages and values outside a parameter's range are logged
   * and dropped.
   */
  receive(bytes: ReadonlyArray<number>): DecodedParameter[] {
    if (bytes[1] === UNIVERSAL_NON_REALTIME) {
      this.receiveIdentityReply(bytes);
      return [];
    }

    const result = this.sysExParser.parse(bytes);
    if (!result.ok) {
      this.logger.warn(
        `Discarding ${result.error.kind} message ${toHex(bytes)}: ${result.error.message}`,
      );
      return [];
    }
    const message = result.message;
    if (message.command !== 'DT1') {
      this.logger.warn(`Discarding unexpected RQ1 ${toHex(bytes)}`);
      return [];
    }

    const data = valueBytes(message);
    const decoded: DecodedParameter[] = [];
    for (const location of this.addressResolver.lookupSpan(
      message.address,
      message.offset,
      data.length,
    )) {
      const { spec, index } = location;
      try {
        const raw = this.mapper.fromBytes(spec, data.slice(index, index + spec.size));
        decoded.push({
          synthType: location.synthType,
          partialIndex: location.partialIndex,
          parameterId: spec.id,
          section: spec.section,
          raw,
          displayValue: this.mapper.toDisplay(spec, raw),
        });
      } catch (error) {
        if (!(error instanceof JdxiProtocolError)) {
          throw error;
        }
        this.logger.warn(`Discarding ${spec.id}: ${error.message}`);
      }
    }

    decoded.forEach((parameter) => {
      this.remember(
        parameter.synthType,
        parameter.partialIndex,
        parameter.parameterId,
        parameter.displayValue,
      );
      this.updates.next(parameter);
    });
    return decoded;
  }

  parameterState(
    synthType: SynthType,
    partialIndex?: number | string,
  ): Record<string, DisplayValue> {
    const index =
      synthType === SynthType.ANALOG
        ? undefined
        : this.partialIndex(synthType, partialIndex);
    return Object.fromEntries(this.state.get(stateKey(synthType, index)) ?? []);
  }

  deviceInfo(): DeviceInfo | undefined {
    return this.device;
  }

  private partialIndex(
    synthType: SynthType,
    partialIndex: number | string | undefined,
  ): number | undefined {
    if (typeof partialIndex !== 'string') {
      return partialIndex;
    }
    if (synthType !== SynthType.DRUMS) {
      throw new InvalidPartialError(
        synthType,
        partialIndex,
        'only drum partials have names',
      );
    }
    return this.addressResolver.drumPartialIndex(partialIndex);
  }

  private transmit(message: ReadonlyArray<number>): void {
    this.logger.debug(`Sending ${toHex(message)}`);
    if (!this.midiService.send(message)) {
      this.logger.warn(`Could not send ${toHex(message)}`);
      throw new MessageNotSentError(message);
    }
  }

  private remember(
    synthType: SynthType,
    partialIndex: number | undefined,
    parameterId: string,
    displayValue: DisplayValue,
  ): void {
    const key = stateKey(synthType, partialIndex);
    const values = this.state.get(key) ?? new Map<string, DisplayValue>();
    values.set(parameterId, displayValue);
    this.state.set(key, values);
  }

  private receiveIdentityReply(bytes: ReadonlyArray<number>): void {
    const info = this.sysExParser.parseIdentityReply(bytes);
    if (info === undefined) {
      this.logger.warn(`Discarding universal message ${toHex(bytes)}`);
      return;
    }
    this.device = info;
    this.logger.log(`Connected to ${describeDevice(info)}`);
  }
}
