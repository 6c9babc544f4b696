import { z } from 'zod';
import { optionalText, xmlText } from './fields.js';
import { defineXmlModel } from './xml.js';

export const LOGIN_ROOT_ELEMENT = 'com.mirth.connect.model.LoginStatus';

/** Statuses that leave the session logged in */
export const SUCCESSFUL_LOGIN_STATUSES: readonly string[] = ['SUCCESS', 'SUCCESS_GRACE_PERIOD'];

export const loginResponseSchema = z.object({
  status: xmlText,
  message: optionalText,
  updatedUsername: optionalText,
});

export const LoginResponse = defineXmlModel({ rootElement: LOGIN_ROOT_ELEMENT, schema: loginResponseSchema });
export type LoginResponse = z.output<typeof loginResponseSchema>;
