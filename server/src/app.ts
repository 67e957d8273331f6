import bcrypt from "bcrypt";
import cors from "cors";
import express, { type ErrorRequestHandler, type NextFunction, type Request, type Response } from "express";
import path from "node:path";
import type { Logger } from "pino";
import { z, ZodError } from "zod";
import { authenticatedUser, requireAuth, signToken } from "./auth";
import type { Config } from "./config";
import type { GameCoordinator } from "./coordinator";
import { HttpError, badRequest, conflict, notFound, unauthorized } from "./errors";
import { UsernameTakenError, type SqliteStore } from "./store";

export interface AppDeps {
  store: SqliteStore;
  coordinator: GameCoordinator;
  config: Pick<Config, "jwtSecret" | "corsOrigins" | "staticDir" | "bcryptRounds">;
  logger: Logger;
}

const credentialsSchema = z.object({
  username: z.string().trim(),
  password: z.string(),
});

const limitSchema = z.coerce.number().int().min(1).max(100).default(20).catch(20);
const userIdSchema = z.coerce.number().int().positive();

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

function asyncHandler(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

export function createApp({ store, coordinator, config, logger }: AppDeps): express.Express {
  const app = express();

  app.use(cors({ origin: config.corsOrigins, credentials: true }));
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  // ---------- routes: auth ----------
  app.post(
    "/api/signup",
    asyncHandler(async (req, res) => {
      const { username, password } = credentialsSchema.parse(req.body);
      if (username.length < 3) throw badRequest("Username must be at least 3 characters");
      if (password.length < 6) throw badRequest("Password must be at least 6 characters");

      const hash = await bcrypt.hash(password, config.bcryptRounds);
      try {
        const id = store.createUser(username, hash);
        logger.info({ userId: id, username }, "user signed up");
      } catch (err) {
        if (err instanceof UsernameTakenError) throw conflict("Username already taken");
        throw err;
      }
      res.status(201).json({ message: "User created" });
    }),
  );

  app.post(
    "/api/login",
    asyncHandler(async (req, res) => {
      const { username, password } = credentialsSchema.parse(req.body);
      const user = store.findUserByUsername(username);
      if (!user || !(await bcrypt.compare(password, user.passwordHash))) {
        throw unauthorized("Invalid username or password");
      }
      const token = signToken({ id: user.id, username: user.username }, config.jwtSecret);
      res.json({ user_id: user.id, username: user.username, token });
    }),
  );

  app.get("/api/me", requireAuth(config.jwtSecret), (_req, res) => {
    const { id } = authenticatedUser(res);
    const user = store.findUser(id);
    if (!user) throw notFound("User not found");
    res.json({
      user_id: user.id,
      username: user.username,
      rating: user.rating,
      wins: user.wins,
      losses: user.losses,
      draws: user.draws,
    });
  });

  // ---------- routes: players & games ----------
  app.get("/api/online-users", (_req, res) => {
    res.json(coordinator.connections.onlineUsers());
  });

  app.get("/api/leaderboard", (req, res) => {
    const limit = limitSchema.parse(req.query.limit);
    res.json(
      store.leaderboard(limit).map((u) => ({
        user_id: u.id,
        username: u.username,
        rating: u.rating,
        wins: u.wins,
        losses: u.losses,
        draws: u.draws,
      })),
    );
  });

  app.get("/api/users/:id/games", (req, res) => {
    const parsed = userIdSchema.safeParse(req.params.id);
    if (!parsed.success) throw badRequest("Invalid user id");
    if (!store.findUser(parsed.data)) throw notFound("User not found");
    res.json(store.gamesForUser(parsed.data));
  });

  app.get("/api/rooms", (_req, res) => {
    res.json(coordinator.registry.list());
  });

  // serve frontend static files, with an SPA fallback for non-API routes
  if (config.staticDir) {
    const staticDir = path.resolve(config.staticDir);
    app.use(express.static(staticDir));
    app.use((req, res, next) => {
      if (req.path.startsWith("/api") || req.path.startsWith("/ws")) return next();
      res.sendFile(path.join(staticDir, "index.html"));
    });
  }

  app.use("/api", (_req, _res, next) => {
    next(notFound());
  });

  const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    if (err instanceof HttpError) {
      res.status(err.status).json({ error: err.message });
      return;
    }
    if (err instanceof ZodError) {
      res.status(400).json({ error: "Invalid request body" });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON" });
      return;
    }
    logger.error({ err, method: req.method, path: req.path }, "unhandled request error");
    res.status(500).json({ error: "Server error" });
  };
  app.use(errorHandler);

  return app;
}
