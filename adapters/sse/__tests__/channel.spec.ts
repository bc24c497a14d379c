import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import { SseChannel, SseTransport } from '../index';

class FakeRes extends EventEmitter {
  readonly headers: Record<string, string> = {};
  readonly writes: string[] = [];
  status = 0;
  ended = 0;
  writableLength = 0;

  setHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }
  writeHead(status: number): this {
    this.status = status;
    return this;
  }
  write(chunk: string): boolean {
    this.writes.push(chunk);
    return true;
  }
  end(): this {
    this.ended++;
    return this;
  }
}

afterEach(() => {
  vi.useRealTimers();
});

describe('SseChannel', () => {
  it('opens an event stream with a retry hint', () => {
    const res = new FakeRes();
    const channel = new SseChannel(res);
    expect(res.status).toBe(200);
    expect(res.headers['Content-Type']).toBe('text/event-stream');
    expect(res.writes).toEqual(['retry: 2000\n\n', ': connected\n\n']);
    channel.close();
  });

  it('keeps the connection alive for 30s via heartbeats', () => {
    vi.useFakeTimers();
    const res = new FakeRes();
    const channel = new SseChannel(res);
    vi.advanceTimersByTime(30000);
    expect(res.writes.filter(w => w === ':\n\n')).toHaveLength(2);
    channel.close();
    vi.advanceTimersByTime(30000);
    expect(res.writes.filter(w => w === ':\n\n')).toHaveLength(2);
  });

  it('frames each message as a data event', async () => {
    const res = new FakeRes();
    const channel = new SseChannel(res);
    await channel.send('{"type":"pong"}');
    expect(res.writes[2]).toBe('data: {"type":"pong"}\n\n');
    channel.close();
  });

  it('reports a dropped client as closed and refuses later sends', async () => {
    const res = new FakeRes();
    const channel = new SseChannel(res);
    const pending = channel.receive();
    res.emit('close');
    expect(await pending).toEqual({ kind: 'closed', code: 1001, reason: 'client disconnected' });
    await expect(channel.send('x')).rejects.toThrow('stream is closed');
  });

  it('ends the response once on close', async () => {
    const res = new FakeRes();
    const channel = new SseChannel(res);
    channel.close(1011, 'delivery failed');
    channel.close();
    expect(res.ended).toBe(1);
    expect(await channel.receive()).toEqual({ kind: 'closed', code: 1011, reason: 'delivery failed' });
  });

  it('refuses sends while the response buffer is full', async () => {
    const res = new FakeRes();
    res.writableLength = 4096;
    const channel = new SseChannel(res, { maxBufferedBytes: 1024 });
    await expect(channel.send('x')).rejects.toThrow('send buffer above 1024 bytes');
    channel.close();
  });
});

describe('SseTransport', () => {
  it('passes the stream to the handler for the requested device', async () => {
    const devices: string[] = [];
    const transport = new SseTransport(async (deviceId, channel) => {
      devices.push(deviceId);
      channel.close();
    });
    const res = new FakeRes();
    await transport.serve(res, 'sensor-7');
    expect(devices).toEqual(['sensor-7']);
    expect(res.ended).toBe(1);
  });
});
