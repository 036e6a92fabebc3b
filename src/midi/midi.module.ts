import { Module, Provider } from '@nestjs/common';
import { MidiController } from './midi.controller';
import { MidiService } from './midi.service';
import { JdxiSimulatorMidiService } from './jdxi.simulator.midi.service';
import { AddressResolver } from '../address/address-resolver';
import {
  DEVICE_IDENTITY,
  JDXI_CONFIG,
  JdxiConfig,
  loadJdxiConfig,
} from '../config/device-identity';
import { JdxiEditorService } from '../editor/jdxi-editor.service';
import { ProgramBankResolver } from '../program/program-bank-resolver';
import { ChannelMessageBuilder } from '../sysex/channel-message-builder';
import { SysExMessageBuilder } from '../sysex/sysex-message-builder';
import { SysExParser } from '../sysex/sysex-parser';

const configProvider: Provider = {
  provide: JDXI_CONFIG,
  useFactory: () => loadJdxiConfig(),
};

const deviceIdentityProvider: Provider = {
  provide: DEVICE_IDENTITY,
  useFactory: (config: JdxiConfig) => config.deviceIdentity,
  inject: [JDXI_CONFIG],
};

const midiServiceProvider: Provider = {
  provide: MidiService,
  useClass: JdxiSimulatorMidiService,
};

@Module({
  controllers: [MidiController],
  providers: [
    configProvider,
    deviceIdentityProvider,
    midiServiceProvider,
    AddressResolver,
    ProgramBankResolver,
    SysExMessageBuilder,
    SysExParser,
    ChannelMessageBuilder,
    JdxiEditorService,
  ],
  exports: [MidiService, JdxiEditorService, JDXI_CONFIG],
})
export class MidiModule {}
