/**
 * Channel Tests
 */

import axios from 'axios';

jest.mock('axios');

import { MirthApi } from '../../../src/client/MirthApi.js';
import { Channel, raisePostErrors } from '../../../src/client/Channel.js';
import { MirthApiError, MirthPostError, MirthValidationError } from '../../../src/client/errors.js';
import { ChannelMessageModel, buildChannelMessage } from '../../../src/models/messages.js';
import { CHANNEL_ID, RECEIVED_DATE, loadFixture } from '../../helpers/fixtures.js';

const mockedAxios = axios as jest.Mocked<typeof axios>;

function reply(status: number, data = '') {
  return { status, data, headers: {} };
}

describe('Channel', () => {
  let http: { get: jest.Mock; post: jest.Mock };
  let mirth: MirthApi;
  let channel: Channel;

  beforeEach(() => {
    http = { get: jest.fn(), post: jest.fn() };
    mockedAxios.create.mockReturnValue(http as unknown as ReturnType<typeof axios.create>);
    mirth = new MirthApi({ baseUrl: 'https://mirth.test:8443/api' });
    mirth.version = '4.4.1';
    channel = new Channel(mirth, CHANNEL_ID, { name: 'ADT Inbound', revision: '4' });
  });

  describe('constructor', () => {
    it('should keep the metadata it was given', () => {
      expect(channel.id).toBe(CHANNEL_ID);
      expect(channel.name).toBe('ADT Inbound');
      expect(channel.revision).toBe('4');
      expect(channel.description).toBeUndefined();
    });

    it('should reject ids that are not UUIDs', () => {
      expect(() => new Channel(mirth, 'adt-inbound')).toThrow(MirthValidationError);
      expect(() => new Channel(mirth, 'adt-inbound')).toThrow('Invalid channel id: adt-inbound');
    });
  });

  describe('postMessagePath', () => {
    it('should use messagesWithObj from 3.9.0', () => {
      expect(channel.postMessagePath).toBe(`/channels/${CHANNEL_ID}/messagesWithObj`);
      mirth.version = '3.9.0';
      expect(channel.postMessagePath).toBe(`/channels/${CHANNEL_ID}/messagesWithObj`);
    });

    it('should use messages on older or unknown servers', () => {
      mirth.version = '3.8.1';
      expect(channel.postMessagePath).toBe(`/channels/${CHANNEL_ID}/messages`);
      mirth.version = null;
      expect(channel.postMessagePath).toBe(`/channels/${CHANNEL_ID}/messages`);
    });
  });

  describe('getInfo / getStatistics', () => {
    it('should fetch channel metadata', async () => {
      http.get.mockResolvedValueOnce(reply(200, loadFixture('channel.xml')));

      const info = await channel.getInfo();

      expect(http.get).toHaveBeenCalledWith(`/channels/${CHANNEL_ID}`, { headers: {} });
      expect(info.description).toBe('Receives ADT feeds from the lab');
    });

    it('should fetch statistics', async () => {
      http.get.mockResolvedValueOnce(reply(200, loadFixture('channel_statistics.xml')));

      const statistics = await channel.getStatistics();

      expect(http.get).toHaveBeenCalledWith(`/channels/${CHANNEL_ID}/statistics`, { headers: {} });
      expect(statistics.error).toBe(2);
    });
  });

  describe('getMessages', () => {
    it('should send default paging', async () => {
      http.get.mockResolvedValueOnce(reply(200, loadFixture('messages_list.xml')));

      const messages = await channel.getMessages();

      expect(http.get).toHaveBeenCalledWith(
        `/channels/${CHANNEL_ID}/messages?limit=20&offset=0&includeContent=false`,
        { headers: {} }
      );
      expect(messages.map((message) => message.messageId)).toEqual([44, 45]);
    });

    it('should upper-case statuses and merge extra parameters', async () => {
      http.get.mockResolvedValueOnce(reply(200, '<list/>'));

      await channel.getMessages({
        limit: 5,
        offset: 10,
        includeContent: true,
        status: ['error', 'Sent'],
        params: { textSearch: 'PID', limit: 99 },
      });

      expect(http.get).toHaveBeenCalledWith(
        `/channels/${CHANNEL_ID}/messages?textSearch=PID&limit=5&offset=10&includeContent=true&status=ERROR&status=SENT`,
        { headers: {} }
      );
    });

    it('should return no messages for an empty body', async () => {
      http.get.mockResolvedValueOnce(reply(200, ''));

      expect(await channel.getMessages()).toEqual([]);
    });
  });

  describe('previewMessage', () => {
    it('should search for exactly one message id', async () => {
      http.get.mockResolvedValueOnce(reply(200, loadFixture('messages_list.xml')));

      const preview = await channel.previewMessage(44);

      expect(http.get).toHaveBeenCalledWith(
        `/channels/${CHANNEL_ID}/messages?minMessageId=44&maxMessageId=44&includeContent=false&offset=0&limit=1`,
        { headers: {} }
      );
      expect(preview?.messageId).toBe(44);
    });

    it('should return null when nothing matches', async () => {
      http.get.mockResolvedValueOnce(reply(200, '<list/>'));

      expect(await channel.previewMessage(99)).toBeNull();
    });
  });

  describe('getMessage', () => {
    it('should fetch a message with content', async () => {
      http.get.mockResolvedValueOnce(reply(200, loadFixture('message.xml')));

      const message = await channel.getMessage(42);

      expect(http.get).toHaveBeenCalledWith(`/channels/${CHANNEL_ID}/messages/42?includeContent=true`, {
        headers: {},
      });
      expect(message?.receivedDate).toEqual(RECEIVED_DATE);
    });

    it('should return null for a missing message', async () => {
      http.get.mockResolvedValueOnce(reply(204, ''));

      expect(await channel.getMessage(42, false)).toBeNull();
    });
  });

  describe('getMessageCount', () => {
    it('should count messages by status', async () => {
      http.get.mockResolvedValueOnce(reply(200, '<long>7</long>'));

      const count = await channel.getMessageCount(['error']);

      expect(count).toBe(7);
      expect(http.get).toHaveBeenCalledWith(`/channels/${CHANNEL_ID}/messages/count?status=ERROR`, {
        headers: {},
      });
    });
  });

  describe('postMessage', () => {
    it('should post a RawMessage and return the processed message', async () => {
      http.post.mockResolvedValueOnce(reply(200, '<long>42</long>'));
      http.get.mockResolvedValueOnce(reply(200, loadFixture('message.xml')));

      const received = await channel.postMessage('MSH|test');

      expect(http.post).toHaveBeenCalledWith(
        `/channels/${CHANNEL_ID}/messagesWithObj`,
        buildChannelMessage('MSH|test'),
        { headers: { 'Content-Type': 'application/xml' } }
      );
      expect(http.get).toHaveBeenCalledWith(`/channels/${CHANNEL_ID}/messages/42?includeContent=false`, {
        headers: {},
      });
      expect(received?.messageId).toBe(42);
    });

    it('should return null when an older server answers with no body', async () => {
      mirth.version = '3.8.0';
      http.post.mockResolvedValueOnce(reply(204, ''));

      const received = await channel.postMessage('MSH|test', { binary: true });

      expect(received).toBeNull();
      expect(http.post).toHaveBeenCalledWith(`/channels/${CHANNEL_ID}/messages`, buildChannelMessage('MSH|test', true), {
        headers: { 'Content-Type': 'application/xml' },
      });
      expect(http.get).not.toHaveBeenCalled();
    });

    it('should raise the connector error', async () => {
      http.post.mockResolvedValueOnce(reply(200, '<long>43</long>'));
      http.get.mockResolvedValueOnce(reply(200, loadFixture('message_error.xml')));

      const result = channel.postMessage('MSH|test');

      await expect(result).rejects.toThrow(MirthPostError);
      await expect(result).rejects.toThrow('Error posting to Mirth: Connection refused');
    });

    it('should return an errored message when errors are not raised', async () => {
      http.post.mockResolvedValueOnce(reply(200, '<long>43</long>'));
      http.get.mockResolvedValueOnce(reply(200, loadFixture('message_error.xml')));

      const received = await channel.postMessage('MSH|test', { raiseErrors: false });

      expect(received?.connectorMessages['1']?.status).toBe('ERROR');
    });

    it('should fail when the posted message cannot be found', async () => {
      http.post.mockResolvedValueOnce(reply(200, '<long>43</long>'));
      http.get.mockResolvedValueOnce(reply(200, ''));

      await expect(channel.postMessage('MSH|test')).rejects.toThrow(
        new MirthPostError('Error posting to Mirth: Sent message is missing from Mirth')
      );
    });
  });

  describe('control commands', () => {
    it.each(['start', 'stop', 'pause', 'resume', 'deploy', 'undeploy'] as const)(
      'should post _%s with returnErrors',
      async (command) => {
        http.post.mockResolvedValueOnce(reply(204));

        await channel[command]();

        expect(http.post).toHaveBeenCalledWith(`/channels/${CHANNEL_ID}/_${command}?returnErrors=true`, undefined, {
          headers: {},
        });
      }
    );

    it('should raise MirthApiError when the server refuses', async () => {
      http.post.mockResolvedValueOnce(reply(500, 'Channel not deployed'));

      await expect(channel.stop()).rejects.toThrow(MirthApiError);
    });
  });
});

describe('raisePostErrors', () => {
  const errored = ChannelMessageModel.parse(loadFixture('message_error.xml'));

  it('should use the error code when no response was captured', () => {
    const destination = errored.connectorMessages['1'];
    if (!destination) throw new Error('fixture has no destination');
    const message: ChannelMessageModel = {
      ...errored,
      connectorMessages: { '1': { ...destination, response: undefined } },
    };

    expect(() => raisePostErrors(message)).toThrow(new MirthPostError('Error posting to Mirth: Error Code 4'));
  });

  it('should pass messages without errors', () => {
    expect(() => raisePostErrors(ChannelMessageModel.parse(loadFixture('message.xml')))).not.toThrow();
  });
});
