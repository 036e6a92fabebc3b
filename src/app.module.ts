import { Module } from '@nestjs/common';
import { MidiModule } from './midi/midi.module';

@Module({
  imports: [MidiModule],
})
export class AppModule {}
