/**
 * Channel message models
 *
 * A message is the unit that flows through a channel; it owns one connector
 * message per connector it reached (metadata id 0 is the source).
 */

import { XMLBuilder } from 'fast-xml-parser';
import { z } from 'zod';
import {
  mirthDate,
  optionalElement,
  optionalText,
  xmlBoolean,
  xmlContainer,
  xmlInt,
  xmlList,
  xmlText,
  xmlUuid,
} from './fields.js';
import { xmlMap } from './hashmap.js';
import { defineXmlModel, type XmlModelOutput } from './xml.js';

export const RAW_MESSAGE_ELEMENT = 'com.mirth.connect.donkey.model.message.RawMessage';

/**
 * Connector message `raw`, `encoded`, `sent`, `response` etc. content
 */
export const connectorMessageDataSchema = z.object({
  channelId: xmlUuid,
  content: optionalText,
  contentType: xmlText,
  dataType: optionalText,
  encrypted: xmlBoolean,
  messageId: xmlText,
  messageDataId: optionalText,
});
export type ConnectorMessageData = z.output<typeof connectorMessageDataSchema>;

export const connectorMessageSchema = z.object({
  chainId: xmlInt,
  orderId: xmlInt,
  serverId: xmlUuid,
  channelId: xmlText,
  status: optionalText,
  receivedDate: mirthDate,
  sendDate: optionalElement(mirthDate),
  responseDate: optionalElement(mirthDate),
  channelName: xmlText,
  connectorName: optionalText,
  messageId: xmlText,
  errorCode: xmlInt,
  sendAttempts: xmlInt,
  raw: optionalElement(connectorMessageDataSchema),
  encoded: optionalElement(connectorMessageDataSchema),
  sent: optionalElement(connectorMessageDataSchema),
  response: optionalElement(connectorMessageDataSchema),
  metaDataId: xmlInt,
  metaDataMap: xmlMap(optionalText),
});

export const ConnectorMessageModel = defineXmlModel({
  rootElement: 'connectorMessage',
  schema: connectorMessageSchema,
});
export type ConnectorMessageModel = z.output<typeof connectorMessageSchema>;

export const channelMessageSchema = z.object({
  messageId: xmlInt,
  serverId: xmlUuid,
  channelId: xmlUuid,
  processed: xmlBoolean,
  receivedDate: mirthDate,
  // keyed by connector metadata id
  connectorMessages: xmlMap(connectorMessageSchema),
});

export const ChannelMessageModel = defineXmlModel({ rootElement: 'message', schema: channelMessageSchema });
export type ChannelMessageModel = z.output<typeof channelMessageSchema>;

export const ChannelMessageList = defineXmlModel({
  rootElement: 'list',
  schema: xmlContainer({ message: xmlList(channelMessageSchema) }),
  forceList: ['list.message'],
});
export type ChannelMessageList = XmlModelOutput<typeof ChannelMessageList>;

/**
 * Bare `<long>` body, returned for a posted message id and for counts
 */
export const LongResponse = defineXmlModel({ rootElement: 'long', schema: xmlInt });

/** Id of a message posted to /messagesWithObj */
export const ChannelMessageResponse = LongResponse;

/**
 * Error body written to a connector message's response content
 */
export const mirthErrorMessageSchema = z.object({
  status: optionalText,
  message: optionalText,
  error: optionalText,
  statusMessage: optionalText,
});

export const MirthErrorMessage = defineXmlModel({ rootElement: 'response', schema: mirthErrorMessageSchema });
export type MirthErrorMessage = z.output<typeof mirthErrorMessageSchema>;

const rawMessageBuilder = new XMLBuilder({ format: false });

/**
 * Build the RawMessage XML body accepted by the channel message endpoints
 */
export function buildChannelMessage(rawData?: string, binary = false): string {
  const body: Record<string, string> = { binary: String(binary) };
  if (rawData) {
    body['rawData'] = rawData;
  }
  return rawMessageBuilder.build({ [RAW_MESSAGE_ELEMENT]: body });
}
