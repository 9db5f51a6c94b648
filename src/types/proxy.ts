export interface Proxy {
  scheme: string;
  host: string;
  port?: number;
  username?: string;
  password?: string;
}

export interface PlaywrightProxy {
  server: string;
  username?: string;
  password?: string;
}
