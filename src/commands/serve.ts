import type { Server } from "http";
import { loadProfile, loadServerSettings } from "../config/registry";
import { startServer } from "../http/server";

export interface ServeOptions {
  profilePath?: string;
  port?: number;
  host?: string;
}

export async function runServe(options: ServeOptions): Promise<Server> {
  const settings = loadServerSettings();
  const profile = await loadProfile(options.profilePath);
  const server = await startServer({
    profile,
    settings: {
      ...settings,
      port: options.port ?? settings.port,
      host: options.host ?? settings.host
    }
  });
  console.log(`Listening on http://${options.host ?? settings.host}:${options.port ?? settings.port}`);
  if (!profile.anchor_name) {
    console.warn("No SCHEDULE_ANCHOR_NAME configured; uploads must send a 'name' field.");
  }
  return server;
}
