/**
 * Server event (audit log) models
 */

import { z } from 'zod';
import { mirthDate, optionalText, xmlContainer, xmlInt, xmlList, xmlText } from './fields.js';
import { xmlMap } from './hashmap.js';
import { defineXmlModel, type XmlModelOutput } from './xml.js';

export const EVENT_OUTCOMES = ['SUCCESS', 'FAILURE'] as const;
export type EventOutcome = (typeof EVENT_OUTCOMES)[number];

export const eventSchema = z.object({
  id: xmlInt,
  level: xmlText,
  name: xmlText,
  outcome: xmlText,
  attributes: xmlMap(optionalText),
  userId: optionalText,
  ipAddress: optionalText,
  serverId: optionalText,
  dateTime: mirthDate,
});

export const EventModel = defineXmlModel({ rootElement: 'event', schema: eventSchema });
export type EventModel = z.output<typeof eventSchema>;

export const EventList = defineXmlModel({
  rootElement: 'list',
  schema: xmlContainer({ event: xmlList(eventSchema) }),
  forceList: ['list.event'],
});
export type EventList = XmlModelOutput<typeof EventList>;
