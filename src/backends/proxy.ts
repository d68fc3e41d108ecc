import { HttpProxyAgent, HttpsProxyAgent } from "hpagent";
import { SocksProxyAgent } from "socks-proxy-agent";
import type { Agents } from "got";

import type { ProxyConfig, ProxyType } from "../config/schema.js";

/**
 * socks5 统一改为 socks5h，让 DNS 解析也走代理
 */
export function normalizeProxyType(type: ProxyType): Exclude<ProxyType, "socks5"> {
  return type === "socks5" ? "socks5h" : type;
}

/**
 * 未启用或缺少 host/port 时返回 null。用户名密码做 URL 编码。
 */
export function buildProxyUrl(proxy: ProxyConfig): string | null {
  if (!proxy.enabled || proxy.host.trim().length === 0 || proxy.port === undefined) {
    return null;
  }
  const scheme = normalizeProxyType(proxy.type);
  const host = proxy.host.trim();
  if (proxy.username && proxy.password) {
    const user = encodeURIComponent(proxy.username);
    const pass = encodeURIComponent(proxy.password);
    return `${scheme}://${user}:${pass}@${host}:${proxy.port}`;
  }
  return `${scheme}://${host}:${proxy.port}`;
}

export function createProxyAgents(proxy: ProxyConfig): Agents | undefined {
  const url = buildProxyUrl(proxy);
  if (!url) {
    return undefined;
  }
  if (url.startsWith("socks")) {
    const agent = new SocksProxyAgent(url);
    return { http: agent, https: agent };
  }
  return {
    http: new HttpProxyAgent({ proxy: url, keepAlive: true }),
    https: new HttpsProxyAgent({ proxy: url, keepAlive: true })
  };
}
