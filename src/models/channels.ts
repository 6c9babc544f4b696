/**
 * Channel, channel group, statistics and dashboard status models
 */

import { z } from 'zod';
import {
  mirthDate,
  optionalElement,
  optionalText,
  xmlContainer,
  xmlInt,
  xmlList,
  xmlText,
  xmlUuid,
} from './fields.js';
import { defineXmlModel, isRecord, type XmlModelOutput } from './xml.js';

// =============================================================================
// Channels
// =============================================================================

export const channelSchema = z.object({
  id: xmlUuid,
  name: xmlText,
  description: optionalText,
  revision: xmlText,
});

export const ChannelModel = defineXmlModel({ rootElement: 'channel', schema: channelSchema });
export type ChannelModel = z.output<typeof channelSchema>;

export const ChannelList = defineXmlModel({
  rootElement: 'list',
  schema: xmlContainer({ channel: xmlList(channelSchema) }),
  forceList: ['list.channel'],
});
export type ChannelList = XmlModelOutput<typeof ChannelList>;

// =============================================================================
// Channel groups
// =============================================================================

/**
 * Minimal channel reference held by a group
 */
export const groupChannelSchema = z.object({
  id: xmlUuid,
  revision: xmlText,
});
export type GroupChannel = z.output<typeof groupChannelSchema>;

export const channelGroupSchema = z.object({
  id: xmlUuid,
  name: xmlText,
  description: optionalText,
  revision: xmlText,
  // <channels><channel>..</channel></channels> → the inner list
  channels: z.preprocess(
    (value) => (isRecord(value) && 'channel' in value ? value['channel'] : value),
    xmlList(groupChannelSchema)
  ),
});

export const ChannelGroup = defineXmlModel({
  rootElement: 'channelGroup',
  schema: channelGroupSchema,
  forceList: ['channelGroup.channels.channel'],
});
export type ChannelGroup = z.output<typeof channelGroupSchema>;

export const GroupList = defineXmlModel({
  rootElement: 'list',
  schema: xmlContainer({ channelGroup: xmlList(channelGroupSchema) }),
  forceList: ['list.channelGroup', 'list.channelGroup.channels.channel'],
});
export type GroupList = XmlModelOutput<typeof GroupList>;

// =============================================================================
// Statistics
// =============================================================================

export const channelStatisticsSchema = z.object({
  serverId: xmlUuid,
  channelId: xmlUuid,
  received: xmlInt,
  sent: xmlInt,
  error: xmlInt,
  filtered: xmlInt,
  queued: xmlInt,
});

export const ChannelStatistics = defineXmlModel({
  rootElement: 'channelStatistics',
  schema: channelStatisticsSchema,
});
export type ChannelStatistics = z.output<typeof channelStatisticsSchema>;

export const ChannelStatisticsList = defineXmlModel({
  rootElement: 'list',
  schema: xmlContainer({ channelStatistics: xmlList(channelStatisticsSchema) }),
  forceList: ['list.channelStatistics'],
});
export type ChannelStatisticsList = XmlModelOutput<typeof ChannelStatisticsList>;

// =============================================================================
// Dashboard statuses
// =============================================================================

export const dashboardStatusSchema = z.object({
  channelId: xmlUuid,
  name: xmlText,
  state: xmlText,
  deployedRevisionDelta: optionalElement(xmlInt),
  deployedDate: optionalElement(mirthDate),
});

export const DashboardStatus = defineXmlModel({
  rootElement: 'dashboardStatus',
  schema: dashboardStatusSchema,
});
export type DashboardStatus = z.output<typeof dashboardStatusSchema>;

export const DashboardStatusList = defineXmlModel({
  rootElement: 'list',
  schema: xmlContainer({ dashboardStatus: xmlList(dashboardStatusSchema) }),
  forceList: ['list.dashboardStatus'],
});
export type DashboardStatusList = XmlModelOutput<typeof DashboardStatusList>;
