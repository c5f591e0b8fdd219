import { describe, expect, it, vi } from 'vitest';
import { NotifyDeliveryError } from '../../../application/errors/CheckErrors.js';
import type { Transport } from '../../http/FetchTransport.js';
import { LogNotifier } from './LogNotifier.js';
import { MessageFormatter } from './MessageFormatter.js';
import { TelegramNotifier } from './TelegramNotifier.js';

const createLogger = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe('TelegramNotifier', () => {
  it('posts markdown text to the chat', async () => {
    const transport = vi.fn<Transport>(async () => ({ status: 200, body: { ok: true } }));
    const notifier = new TelegramNotifier({ botToken: 'test-token' }, transport, new MessageFormatter(), createLogger());

    await notifier.sendText('1001', 'Hei');

    expect(transport).toHaveBeenCalledTimes(1);
    const [request] = transport.mock.calls[0];
    expect(request.url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(request.method).toBe('POST');
    expect(JSON.parse(request.body)).toEqual({ chat_id: '1001', text: 'Hei', parse_mode: 'Markdown' });
  });

  it('formats balance changes before sending', async () => {
    const transport = vi.fn<Transport>(async () => ({ status: 200, body: {} }));
    const notifier = new TelegramNotifier({ botToken: 'test-token' }, transport, new MessageFormatter(), createLogger());

    await notifier.notifyBalanceChanged({
      subscriberId: '1001',
      currentBalance: 150,
      previousBalance: 100,
      delta: 50,
      lastTransaction: null,
      checkedAt: '2025-10-17T08:00:00.000Z',
    });

    const [request] = transport.mock.calls[0];
    expect(JSON.parse(request.body)).toEqual({
      chat_id: '1001',
      text: '🔔 *Saldoendring oppdaget!*\n\n📊 *Ny saldo:* 150,00 kr\n📊 *Forrige saldo:* 100,00 kr\n📈 *Endring:* +50,00 kr',
      parse_mode: 'Markdown',
    });
  });

  it('rejects non-2xx responses', async () => {
    const transport = vi.fn<Transport>(async () => ({ status: 403, body: { ok: false } }));
    const notifier = new TelegramNotifier({ botToken: 'test-token' }, transport, new MessageFormatter(), createLogger());

    const result = notifier.sendText('1001', 'Hei');

    await expect(result).rejects.toBeInstanceOf(NotifyDeliveryError);
    await expect(result).rejects.toThrow('Could not deliver notification to 1001: Bot API responded with status 403');
  });

  it('wraps transport errors', async () => {
    const transport = vi.fn<Transport>(async () => {
      throw new Error('socket hang up');
    });
    const notifier = new TelegramNotifier({ botToken: 'test-token' }, transport, new MessageFormatter(), createLogger());

    await expect(notifier.sendText('1001', 'Hei')).rejects.toMatchObject({
      code: 'notify_delivery_failure',
      message: 'Could not deliver notification to 1001: socket hang up',
    });
  });
});

describe('LogNotifier', () => {
  it('logs the rendered message', async () => {
    const logger = createLogger();

    await new LogNotifier(new MessageFormatter(), logger).sendText('1001', 'Hei');

    expect(logger.info).toHaveBeenCalledWith('Notification (no bot token configured)', {
      subscriberId: '1001',
      text: 'Hei',
    });
  });
});
