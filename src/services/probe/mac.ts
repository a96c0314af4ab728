const BARE_HEX_MAC = /^[0-9a-f]{12}$/;
const MAC_LINE = /^\s*MAC:\s*((?:[0-9a-fA-F]{2}[:-]){5}[0-9a-fA-F]{2}|[0-9a-fA-F]{12})\b/m;

/**
 * 统一 MAC 格式：小写，12 位裸十六进制转成冒号分隔
 */
export function formatMac(value: string | Uint8Array | readonly number[]): string {
  if (typeof value !== 'string') {
    return Array.from(value, (b) => (b & 0xff).toString(16).padStart(2, '0')).join(':');
  }
  const text = value.trim().toLowerCase();
  if (BARE_HEX_MAC.test(text)) {
    return text.match(/.{2}/g)?.join(':') ?? text;
  }
  return text.replace(/-/g, ':');
}

/**
 * 从 esptool 输出中取第一行 "MAC: ..."
 */
export function extractMac(output: string): string {
  const m = MAC_LINE.exec(output);
  return m ? formatMac(m[1]) : '';
}
