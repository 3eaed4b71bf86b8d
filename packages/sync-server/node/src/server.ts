import { attr } from "@scenewire/interface";
import type { SceneServer } from "@scenewire/sync";
import { createSceneServer } from "@scenewire/sync";
import { startWebSocketSceneServer } from "@scenewire/sync-server-core";

import type { ServerConfig } from "./config.js";

export type SceneServerProcessOptions = Partial<ServerConfig> & {
  /** Scene to serve; a small default scene is built when omitted. */
  scene?: SceneServer;
};

export type SceneServerProcessHandle = {
  host: string;
  port: number;
  syncPath: string;
  scene: SceneServer;
  close: () => Promise<void>;
};

/**
 * A world frame with a ground grid, plus a GUI panel whose controls drive the grid.
 */
export function populateDefaultScene(scene: SceneServer): void {
  scene.atomic(() => {
    const world = scene.createNode({ id: "/world", kind: "frame", attributes: { axesLength: attr.float(1) } });
    const grid = world.child({
      name: "grid",
      kind: "grid",
      attributes: {
        width: attr.float(10),
        height: attr.float(10),
        cellSize: attr.float(0.5),
        color: attr.color(200, 200, 200),
      },
    });
    world.child({
      name: "light",
      kind: "light",
      attributes: { position: attr.vec3(0, 5, 5), intensity: attr.float(1) },
    });

    scene.createNode({ id: "/gui", kind: "group", attributes: { label: attr.string("Scene") } });
    const cellSize = scene.registerControl({
      id: "/gui/cellSize",
      parent: "/gui",
      spec: { type: "slider", initial: 0.5, min: 0.1, max: 2, step: 0.1, label: "Cell size", order: 0 },
    });
    const gridColor = scene.registerControl({
      id: "/gui/gridColor",
      parent: "/gui",
      spec: { type: "rgb", initial: [200, 200, 200], label: "Grid color", order: 1 },
    });
    const showGrid = scene.registerControl({
      id: "/gui/showGrid",
      parent: "/gui",
      spec: { type: "checkbox", initial: true, label: "Show grid", order: 2 },
    });

    cellSize.onValue((value) => grid.update({ cellSize: attr.float(value) }));
    gridColor.onValue(([r, g, b]) => grid.update({ color: attr.color(r, g, b) }));
    showGrid.onValue((visible) => grid.update({ visible: attr.bool(visible) }));
  });
}

export async function startSceneServer(opts: SceneServerProcessOptions = {}): Promise<SceneServerProcessHandle> {
  const ownsScene = opts.scene === undefined;
  const scene =
    opts.scene ??
    createSceneServer({
      limits: {
        maxQueuedMessages: opts.maxQueuedMessages,
        maxQueuedBytes: opts.maxQueuedBytes,
        maxFrameBytes: opts.maxPayloadBytes,
      },
      debug: opts.debug,
    });
  if (ownsScene) populateDefaultScene(scene);

  const ws = await startWebSocketSceneServer({
    scene,
    host: opts.host,
    port: opts.port,
    syncPath: opts.syncPath,
    maxPayloadBytes: opts.maxPayloadBytes,
    debug: opts.debug,
  });

  return {
    host: ws.host,
    port: ws.port,
    syncPath: ws.syncPath,
    scene,
    close: async () => {
      await ws.close();
      if (ownsScene) scene.close();
    },
  };
}
