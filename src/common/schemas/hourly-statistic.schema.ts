/**
 * Schema for the hourly statistics of every series
 * One document per (seriesId, hourStart)
 */

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';
import { SeriesKind } from '../../aggregation/models/series.model';

export type HourlyStatisticDocument = HourlyStatistic & Document;

@Schema({ _id: false })
export class StatisticSlot {
  @Prop({ required: true, type: Number, min: 0, max: 59 })
  public minute!: number; // offset from hourStart

  @Prop({ required: true, type: Number })
  public value!: number;
}

export const StatisticSlotSchema = SchemaFactory.createForClass(StatisticSlot);

@Schema({
  timestamps: true,
  collection: 'hourly_statistics'
})
export class HourlyStatistic {
  @Prop({ required: true, type: String })
  public seriesId!: string;

  @Prop({ required: true, type: Date })
  public hourStart!: Date;

  @Prop({ required: true, type: String, enum: Object.values(SeriesKind) })
  public kind!: SeriesKind;

  @Prop({ required: true, type: Boolean, default: false })
  public closed!: boolean;

  @Prop({ required: true, type: Number, min: 0 })
  public sampleCount!: number;

  @Prop({ type: [StatisticSlotSchema], default: [] })
  public slots!: StatisticSlot[];

  @Prop({ required: true, type: Number })
  public mean!: number;

  // Power demand
  @Prop({ type: Number })
  public min?: number;

  @Prop({ type: Number })
  public max?: number;

  // Energy consumption
  @Prop({ type: Number })
  public sum?: number;

  @Prop({ type: Number })
  public cumulativeSum?: number;
}

export const HourlyStatisticSchema = SchemaFactory.createForClass(HourlyStatistic);

HourlyStatisticSchema.index({ seriesId: 1, hourStart: 1 }, { unique: true });
