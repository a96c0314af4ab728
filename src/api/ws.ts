import { WebSocketServer, WebSocket, RawData } from 'ws';
import { Server } from 'http';
import { MonitorEngine } from '../core/MonitorEngine';
import { toErrorMessage } from '../core/errors';

type OutboundMessage =
  | { type: 'record:appended'; data: unknown }
  | { type: 'view:changed'; data: unknown }
  | { type: 'monitor:status'; data: unknown };

function parseMessage(message: RawData): Record<string, unknown> | null {
  const parsed: unknown = JSON.parse(message.toString());
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return null;
  return { ...parsed };
}

export function createWsServer(server: Server, engine: MonitorEngine) {
  const wss = new WebSocketServer({ server, path: '/ws' });

  // 广播函数
  const broadcast = (payload: OutboundMessage) => {
    const msg = JSON.stringify(payload);
    wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(msg);
      }
    });
  };

  // view:changed 在连续入账时合并，避免刷屏
  let viewTimer: NodeJS.Timeout | null = null;
  const scheduleViewBroadcast = () => {
    if (viewTimer) return;
    viewTimer = setTimeout(() => {
      viewTimer = null;
      broadcast({ type: 'view:changed', data: engine.getView() });
    }, 100);
  };

  const unsubs = [
    engine.onAppended((record) => {
      broadcast({ type: 'record:appended', data: record });
    }),
    engine.onView(() => scheduleViewBroadcast()),
    engine.onStatus((status) => {
      broadcast({ type: 'monitor:status', data: status });
    })
  ];

  wss.on('connection', (ws) => {
    console.log('[WS] Client connected');
    ws.send(JSON.stringify({ type: 'monitor:status', data: engine.getStatus() }));
    ws.send(JSON.stringify({ type: 'view:changed', data: engine.getView() }));

    ws.on('message', (message) => {
      try {
        const parsed = parseMessage(message);
        if (!parsed) return;

        // 客户端修改过滤条件
        if (parsed.type === 'filter:set') {
          engine.setFilter({ query: parsed.query, status: parsed.status, unique: parsed.unique });
        }
      } catch (e) {
        console.error('[WS] Invalid message:', toErrorMessage(e));
      }
    });

    ws.on('close', () => {
      console.log('[WS] Client disconnected');
    });
  });

  wss.on('close', () => {
    for (const unsub of unsubs) unsub();
    if (viewTimer) clearTimeout(viewTimer);
  });

  return wss;
}
