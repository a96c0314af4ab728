import test from 'node:test';
import assert from 'node:assert/strict';
import http from 'node:http';
import { AddressInfo } from 'node:net';
import { WebSocket } from 'ws';
import { createWsServer } from '../../api/ws';
import { MonitorEngine } from '../../core/MonitorEngine';
import { ProbePool } from '../../core/ProbePool';
import { ControlledProbe, FakeEnumerator, ok } from '../helpers/fakes';

interface Message {
  type: string;
  data: unknown;
}

function isMessage(v: unknown): v is Message {
  return !!v && typeof v === 'object' && 'type' in v && typeof v.type === 'string' && 'data' in v;
}

function plainView(engine: MonitorEngine): unknown {
  return JSON.parse(JSON.stringify(engine.getView()));
}

function collect(ws: WebSocket) {
  const messages: Message[] = [];
  const waiters: Array<{ type: string; resolve: (m: Message) => void }> = [];
  ws.on('message', (raw) => {
    const parsed: unknown = JSON.parse(raw.toString());
    if (!isMessage(parsed)) return;
    const idx = waiters.findIndex((w) => w.type === parsed.type);
    if (idx >= 0) {
      waiters.splice(idx, 1)[0].resolve(parsed);
    } else {
      messages.push(parsed);
    }
  });
  const next = (type: string) =>
    new Promise<Message>((resolve) => {
      const found = messages.find((m) => m.type === type);
      if (found) {
        messages.splice(messages.indexOf(found), 1);
        resolve(found);
        return;
      }
      waiters.push({ type, resolve });
    });
  return { next };
}

test('websocket clients get a snapshot on connect and live updates afterwards', async () => {
  const enumerator = new FakeEnumerator(['COM3']);
  const probe = new ControlledProbe();
  const engine = new MonitorEngine({ enumerator, probe, pool: new ProbePool(1), pollIntervalMs: 60_000 });
  const server = http.createServer();
  const wss = createWsServer(server, engine);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address: AddressInfo | string | null = server.address();
  assert.ok(address && typeof address === 'object');

  const client = new WebSocket(`ws://127.0.0.1:${address.port}/ws`);
  const inbox = collect(client);
  try {
    const status = await inbox.next('monitor:status');
    assert.deepEqual(status.data, JSON.parse(JSON.stringify(engine.getStatus())));
    const view = await inbox.next('view:changed');
    assert.deepEqual(view.data, { total: 0, records: [], filter: { query: '', status: 'all', unique: false } });

    engine.start();
    await engine.tick();
    probe.resolve('COM3', ok('aa:bb:cc:dd:ee:05'));
    await engine.whenIdle();

    const appended = await inbox.next('record:appended');
    assert.deepEqual(appended.data, JSON.parse(JSON.stringify(engine.getRecords()[0])));

    const afterAppend = await inbox.next('view:changed');
    assert.deepEqual(afterAppend.data, plainView(engine));

    client.send(JSON.stringify({ type: 'filter:set', query: 'ee:05', status: 'success' }));
    const filtered = await inbox.next('view:changed');
    assert.deepEqual(filtered.data, {
      total: 1,
      records: JSON.parse(JSON.stringify(engine.getRecords())),
      filter: { query: 'ee:05', status: 'success', unique: false }
    });
  } finally {
    if (client.readyState !== WebSocket.CLOSED) {
      await new Promise<void>((resolve) => {
        client.once('close', () => resolve());
        client.close();
      });
    }
    engine.dispose();
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});
