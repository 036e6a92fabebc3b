import {
  Body,
  Controller,
  Get,
  HttpException,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ZodType, ZodTypeDef } from 'zod';
import { MidiConnection, MidiPort, MidiService } from './midi.service';
import { isSynthType, SynthType } from '../address/synth-type';
import {
  JdxiEditorService,
  ProgramSelection,
} from '../editor/jdxi-editor.service';
import {
  DecodedParameter,
  inboundMessageSchema,
  parameterEditSchema,
  sectionSchema,
} from '../editor/parameter-edit';
import { DisplayValue } from '../parameters/parameter-spec';
import {
  ProgramBankResolver,
  ProgramIdentity,
} from '../program/program-bank-resolver';
import { BankProgram } from '../sysex/channel-message-builder';
import { DeviceInfo } from '../sysex/device-info';
import { JdxiProtocolError } from '../sysex/sysex-errors';

export type ResolvedProgram = ProgramIdentity & BankProgram;

@Controller('midi')
export class MidiController {
  constructor(
    private midiService: MidiService,
    private editorService: JdxiEditorService,
    private bankResolver: ProgramBankResolver,
  ) {}

  @Get('ports/input')
  getMidiInputPorts(): Array<MidiPort> {
    return this.midiService.getMidiInputPorts();
  }

  @Get('ports/output')
  getMidiOutputPorts(): Array<MidiPort> {
    return this.midiService.getMidiOutputPorts();
  }

  @Get('connections')
  getMidiConnections(): Array<MidiConnection> {
    return this.midiService.getMidiConnections();
  }

  @Post('ports/input/connect/:id')
  connectToInputPort(@Param('id', ParseIntPipe) id: number): boolean {
    return this.midiService.connectToInputPort(id);
  }

  @Post('ports/output/connect/:id')
  connectToOutputPort(@Param('id', ParseIntPipe) id: number): boolean {
    return this.midiService.connectToOutputPort(id);
  }

  @Put('jdxi/parameter')
  jdxiChangeParameter(@Body() body: unknown): ReadonlyArray<number> {
    const edit = this.validate(parameterEditSchema, body);
    return this.accept(() => this.editorService.applyEdit(edit));
  }

  @Post('jdxi/request/:synth_type/:section')
  jdxiRequestSection(
    @Param('synth_type') synthType: string,
    @Param('section') section: string,
    @Query('partial') partial?: string,
  ): ReadonlyArray<number> {
    const type = this.synthType(synthType);
    const validSection = this.validate(sectionSchema, section);
    return this.accept(() =>
      this.editorService.requestSection(type, validSection, this.partial(partial)),
    );
  }

  @Post('jdxi/identity')
  jdxiRequestIdentity(): ReadonlyArray<number> {
    return this.accept(() => this.editorService.requestIdentity());
  }

  @Get('jdxi/identity')
  jdxiIdentity(): DeviceInfo {
    const info = this.editorService.deviceInfo();
    if (info === undefined) {
      throw new HttpException('JD-Xi has not identified itself.', HttpStatus.NOT_FOUND);
    }
    return info;
  }

  @Put('jdxi/program/:bank/:slot')
  jdxiSelectProgram(
    @Param('bank') bank: string,
    @Param('slot', ParseIntPipe) slot: number,
  ): ProgramSelection {
    return this.accept(() => this.editorService.selectProgram(bank, slot));
  }

  @Get('jdxi/program/:bank/:slot')
  jdxiResolveProgram(
    @Param('bank') bank: string,
    @Param('slot', ParseIntPipe) slot: number,
  ): ResolvedProgram {
    return this.accept(() => {
      const bankProgram = this.bankResolver.resolve(bank, slot);
      return {
        ...this.bankResolver.unresolve(bankProgram.msb, bankProgram.lsb, bankProgram.pc),
        ...bankProgram,
      };
    });
  }

  @Get('jdxi/state/:synth_type')
  jdxiParameterState(
    @Param('synth_type') synthType: string,
    @Query('partial') partial?: string,
  ): Record<string, DisplayValue> {
    const type = this.synthType(synthType);
    return this.accept(() =>
      this.editorService.parameterState(type, this.partial(partial)),
    );
  }

  @Post('jdxi/inbound')
  jdxiInbound(@Body() body: unknown): DecodedParameter[] {
    return this.editorService.receive(this.validate(inboundMessageSchema, body));
  }

  /** Protocol errors are rejected edits, reported as 406. */
  private accept<T>(action: () => T): T {
    try {
      return action();
    } catch (error) {
      if (error instanceof JdxiProtocolError) {
        throw new HttpException(
          { statusCode: HttpStatus.NOT_ACCEPTABLE, code: error.code, message: error.message },
          HttpStatus.NOT_ACCEPTABLE,
        );
      }
      throw error;
    }
  }

  private validate<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    value: unknown,
  ): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new HttpException(
        result.error.issues.map((issue) => issue.message).join('; '),
        HttpStatus.BAD_REQUEST,
      );
    }
    return result.data;
  }

  private synthType(value: string): SynthType {
    const upper = value.toUpperCase();
    if (!isSynthType(upper)) {
      throw new HttpException(`Unknown synth type ${value}.`, HttpStatus.BAD_REQUEST);
    }
    return upper;
  }

  // numeric partials are indexes, anything else a drum pad name
  private partial(value: string | undefined): number | string | undefined {
    if (value === undefined || value === '') {
      return undefined;
    }
    return /^\d+$/.test(value) ? parseInt(value, 10) : value;
  }
}
