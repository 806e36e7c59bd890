import { joinUrlPath } from "@ctxsync/shared";

export const HANDOFF_PATH = "/home/ide";

/** `<webBaseUrl>/home/ide?token=<token>&callback_port=<port>`; the token is passed through opaque. */
export const buildHandoffUrl = (webBaseUrl: string, token: string, port: number): URL => {
  const url = joinUrlPath(webBaseUrl, HANDOFF_PATH);
  url.searchParams.set("token", token);
  url.searchParams.set("callback_port", String(port));
  return url;
};
