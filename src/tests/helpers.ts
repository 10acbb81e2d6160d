import { createServer, Socket, type Server } from "node:net";

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function waitFor(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) {
      throw new Error(`condition not met within ${timeoutMs}ms`);
    }
    await sleep(5);
  }
}

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("server has no TCP port"));
        return;
      }
      resolve(address.port);
    });
  });
}

export interface TestServer {
  port: number;
  sockets: Socket[];
  received(): Buffer;
  connection(index?: number): Promise<Socket>;
  close(): Promise<void>;
}

/** A printer stand-in on 127.0.0.1 that records every byte it is sent. */
export async function startServer(): Promise<TestServer> {
  const sockets: Socket[] = [];
  const chunks: Buffer[] = [];
  const waiting: Array<{ index: number; resolve: (socket: Socket) => void }> = [];

  const server = createServer((socket) => {
    sockets.push(socket);
    socket.on("data", (chunk) => chunks.push(chunk));
    socket.on("error", () => undefined);

    const index = sockets.length - 1;
    for (const waiter of waiting.filter((candidate) => candidate.index === index)) {
      waiter.resolve(socket);
    }
  });

  const port = await listen(server);

  return {
    port,
    sockets,
    received: () => Buffer.concat(chunks),
    connection: (index = 0) => {
      const socket = sockets[index];
      if (socket) {
        return Promise.resolve(socket);
      }
      return new Promise((resolve) => waiting.push({ index, resolve }));
    },
    close: () =>
      new Promise((resolve) => {
        for (const socket of sockets) {
          socket.destroy();
        }
        server.close(() => resolve());
      }),
  };
}

/** A port that nothing listens on. */
export async function closedPort(): Promise<number> {
  const server = createServer();
  const port = await listen(server);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

/** Never connects, so every open attempt runs into its timeout. */
export class StalledSocket extends Socket {
  connect(): this {
    return this;
  }
}

/** Connects for real but fails every write. */
export class BrokenPipeSocket extends Socket {
  write(...args: unknown[]): boolean {
    const callback = args.find((arg): arg is (error?: Error | null) => void => typeof arg === "function");
    process.nextTick(() => callback?.(new Error("write EPIPE")));
    return false;
  }
}
