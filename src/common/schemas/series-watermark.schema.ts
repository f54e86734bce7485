import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';

export type SeriesWatermarkDocument = SeriesWatermark & Document;

/**
 * Latest hour of a series whose bucket and every earlier bucket are closed
 */
@Schema({
  timestamps: true,
  collection: 'series_watermarks'
})
export class SeriesWatermark {
  @Prop({ required: true, type: String, unique: true })
  public seriesId!: string;

  @Prop({ type: Date, default: null })
  public watermark!: Date | null;
}

export const SeriesWatermarkSchema = SchemaFactory.createForClass(SeriesWatermark);
