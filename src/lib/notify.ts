import axios from 'axios';
import console from 'console';
import { z } from 'zod';
import type { NotifyResult } from '../models';
import { NotifyError, describeError } from './errors';

const ServerChanResponseSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  data: z
    .object({
      pushid: z.string().optional(),
    })
    .passthrough()
    .nullish(),
});

export function serverChanUrl(sendkey: string): string {
  return `https://sctapi.ftqq.com/${encodeURIComponent(sendkey)}.send`;
}

/** Pushes a Markdown message through the ServerChan relay. */
export async function sendNotification(
  title: string,
  body: string,
  sendkey: string,
): Promise<NotifyResult> {
  const form = new URLSearchParams({ title, desp: body });

  let data: unknown;
  try {
    const res = await axios.post<unknown>(serverChanUrl(sendkey), form, { timeout: 10_000 });
    data = res.data;
  } catch (err) {
    throw new NotifyError(`Notification request failed: ${describeError(err)}`, { cause: err });
  }

  const parsed = ServerChanResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new NotifyError('Unexpected response from the notification relay', {
      cause: parsed.error,
    });
  }
  if (parsed.data.code !== 0) {
    throw new NotifyError(
      `Notification rejected with code ${parsed.data.code}: ${parsed.data.message ?? 'no message'}`,
    );
  }

  console.log('Notification sent:', title);
  const pushId = parsed.data.data?.pushid;
  return pushId !== undefined ? { ok: true, pushId } : { ok: true };
}
