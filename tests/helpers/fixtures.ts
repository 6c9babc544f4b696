/**
 * Canned Mirth API responses under tests/fixtures/responses
 */

import * as fs from 'fs';
import * as path from 'path';

const RESPONSES_DIR = path.join(__dirname, '..', 'fixtures', 'responses');

export const CHANNEL_ID = '5f2a9c1e-7b3d-4e8f-a1c2-3d4e5f6a7b8c';
export const OTHER_CHANNEL_ID = '0a1b2c3d-4e5f-4a6b-8c7d-9e0f1a2b3c4d';
export const SERVER_ID = 'c9d8e7f6-a5b4-4c3d-8e2f-1a0b9c8d7e6f';
export const GROUP_ID = '7e6d5c4b-3a29-4180-9f8e-7d6c5b4a3928';
export const OTHER_GROUP_ID = '3c2b1a09-8f7e-4d6c-b5a4-392817160504';

/** 1643708252777 ms, the receivedDate used throughout the fixtures */
export const RECEIVED_DATE = new Date('2022-02-01T09:37:32.777Z');

export function loadFixture(name: string): string {
  return fs.readFileSync(path.join(RESPONSES_DIR, name), 'utf-8');
}
