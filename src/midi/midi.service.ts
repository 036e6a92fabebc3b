import { Injectable } from '@nestjs/common';
import { Observable } from 'rxjs';

export type MidiPort = {
  id: number;
  name: string;
};

export type MidiConnection = MidiPort & {
  is_input: boolean;
};

/**
 * Transport to the JD-Xi. Outbound messages go through `send`; everything the
 * connected input port receives is published on `incoming$`.
 */
@Injectable()
export abstract class MidiService {
  abstract readonly incoming$: Observable<ReadonlyArray<number>>;
  abstract getMidiInputPorts(): Array<MidiPort>;
  abstract getMidiOutputPorts(): Array<MidiPort>;
  abstract getMidiConnections(): Array<MidiConnection>;
  abstract connectToInputPort(id: number): boolean;
  abstract connectToOutputPort(id: number): boolean;
  abstract send(bytes: ReadonlyArray<number>): boolean;
}
