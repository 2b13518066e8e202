import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockedPost } = vi.hoisted(() => ({
  mockedPost: vi.fn<(url: string, body: unknown, config?: unknown) => Promise<{ data: unknown }>>(),
}));

vi.mock('axios', () => ({
  default: {
    post: mockedPost,
    isAxiosError: (err: unknown) =>
      typeof err === 'object' && err !== null && 'isAxiosError' in err,
  },
}));

import { NotifyError } from './errors';
import { sendNotification, serverChanUrl } from './notify';

describe('sendNotification', () => {
  beforeEach(() => {
    mockedPost.mockReset();
  });

  it('posts the title and Markdown body as form fields', async () => {
    mockedPost.mockResolvedValueOnce({ data: { code: 0, message: '', data: { pushid: '42' } } });

    const result = await sendNotification('Tomorrow', '# Report\nSunny', 'test-sendkey');

    expect(result).toEqual({ ok: true, pushId: '42' });
    const [url, form] = mockedPost.mock.calls[0];
    expect(url).toBe('https://sctapi.ftqq.com/test-sendkey.send');
    expect(form).toBeInstanceOf(URLSearchParams);
    if (form instanceof URLSearchParams) {
      expect(form.get('title')).toBe('Tomorrow');
      expect(form.get('desp')).toBe('# Report\nSunny');
    }
  });

  it('succeeds without a push id', async () => {
    mockedPost.mockResolvedValueOnce({ data: { code: 0, data: null } });

    expect(await sendNotification('t', 'b', 'test-sendkey')).toEqual({ ok: true });
  });

  it('rejects a relay error code', async () => {
    mockedPost.mockResolvedValueOnce({ data: { code: 40001, message: 'bad sendkey' } });

    await expect(sendNotification('t', 'b', 'test-sendkey')).rejects.toThrow(
      'Notification rejected with code 40001: bad sendkey',
    );
  });

  it('rejects a response it cannot read', async () => {
    mockedPost.mockResolvedValueOnce({ data: '<html>gateway timeout</html>' });

    await expect(sendNotification('t', 'b', 'test-sendkey')).rejects.toBeInstanceOf(NotifyError);
  });

  it('wraps transport failures', async () => {
    mockedPost.mockRejectedValueOnce(new Error('socket hang up'));

    await expect(sendNotification('t', 'b', 'test-sendkey')).rejects.toThrow(
      'Notification request failed: socket hang up',
    );
  });
});

describe('serverChanUrl', () => {
  it('escapes the sendkey into the path', () => {
    expect(serverChanUrl('a/b')).toBe('https://sctapi.ftqq.com/a%2Fb.send');
  });
});
