import type { ServerConfig } from "../config/server-config.js";
import { type AppError, fromUnknown, ok, type Result } from "../errors/app-error.js";
import { KeyedLock } from "../files/keyed-lock.js";
import type { BodyExtractor } from "../http/body-extractor.js";
import { defaultBodyExtractors, parseRequest } from "../http/request-parser.js";
import { serializeResponse, writeResponse } from "../http/response-writer.js";
import { SocketReader } from "../http/socket-reader.js";
import type { HttpRequest } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { renderErrorResponse } from "./error-responder.js";
import type { HandlerContext } from "./handlers.js";
import { routeRequest } from "./router.js";
import { TemplateStore } from "./templates.js";
import { WorkerPool } from "./worker-pool.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
}

interface Reply {
  /** Bytes to send back, or `null` when the client left without asking anything. */
  bytes: Uint8Array | null;
  /** The request failed to parse, so part of it may be left unread. */
  rejected: boolean;
}

export class WebServer {
  private socketFactory: ISocketFactory;
  private fileSystem: IFileSystem;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private pool: WorkerPool;
  private templates: TemplateStore;
  private context: HandlerContext;
  private extractors: BodyExtractor[];
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    this.socketFactory = options.socketFactory;
    this.fileSystem = options.fileSystem;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();

    this.pool = new WorkerPool(this.config.workers, this.logger);
    this.templates = new TemplateStore(this.fileSystem, this.config.templatesDir);
    this.extractors = defaultBodyExtractors(this.config.maxUploadSize);
    this.context = {
      fs: this.fileSystem,
      templates: this.templates,
      state: {
        uploadsRoot: this.config.uploadsDir,
        writeLocks: new KeyedLock(),
      },
      allowedExtensions: this.config.allowedExtensions,
    };
  }

  /** Create the uploads directory if needed, then listen. Resolves with the bound port. */
  async start(): Promise<number> {
    if (this.tcpServer) {
      throw new Error("Server is already started");
    }

    await this.fileSystem.mkdir(this.config.uploadsDir);

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        const socket = this.socketFactory.wrapTcpSocket(rawSocket);
        this.handleConnection(socket);
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        resolve(addr?.port ?? this.config.port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        resolve();
        return;
      }

      server.close(() => resolve());
    });
  }

  /** Jobs accepted but not yet picked up by a worker. */
  get pendingConnections(): number {
    return this.pool.pending;
  }

  private handleConnection(socket: ITcpSocket): void {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError(() => {
      this.activeConnections.delete(socket);
    });

    // Attach before queueing so bytes that arrive while the job waits are kept.
    const reader = new SocketReader(socket, {
      timeoutMs: this.config.requestTimeoutMs,
    });

    this.pool.execute(() => this.serveConnection(socket, reader));
  }

  private async serveConnection(
    socket: ITcpSocket,
    reader: SocketReader,
  ): Promise<Result<void>> {
    let rejected = false;
    try {
      let reply: Reply;
      try {
        reply = await this.respond(socket, reader);
      } catch (err) {
        reply = {
          bytes: await this.renderError(
            fromUnknown(err, "Request handling failed").error,
          ),
          rejected: false,
        };
      }
      rejected = reply.rejected;
      if (reply.bytes === null) return ok(undefined);
      return await writeResponse(socket, reply.bytes);
    } finally {
      // Unread request bytes may still be in flight; do not wait on them.
      if (rejected && socket.destroy) {
        socket.destroy();
      } else {
        socket.close();
      }
    }
  }

  private async respond(
    socket: ITcpSocket,
    reader: SocketReader,
  ): Promise<Reply> {
    const request = await parseRequest(reader, this.extractors);
    reader.release();
    if (!request.ok) {
      if (reader.isClosed && reader.bytesReceived === 0) {
        this.logger.debug(
          `Connection from ${socket.remoteAddress ?? "?"} closed without a request`,
        );
        return { bytes: null, rejected: false };
      }
      return { bytes: await this.renderError(request.error), rejected: true };
    }

    const { method, path } = request.value;
    if (!this.config.quiet) {
      this.logger.info(`${method} ${path} - ${socket.remoteAddress ?? "?"}`);
    }

    return { bytes: await this.reply(request.value), rejected: false };
  }

  private async reply(request: HttpRequest): Promise<Uint8Array> {
    const response = await routeRequest(request, this.context);
    if (!response.ok) return this.renderError(response.error);

    const bytes = await serializeResponse(response.value, this.fileSystem);
    if (!bytes.ok) return this.renderError(bytes.error);
    return bytes.value;
  }

  private renderError(error: AppError): Promise<Uint8Array> {
    return renderErrorResponse(error, this.templates, this.fileSystem, this.logger);
  }
}
