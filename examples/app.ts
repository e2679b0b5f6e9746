import express, { ErrorRequestHandler, Request } from "express";
import { toNodeHandler } from "better-auth/node";

type AuthHandler = Parameters<typeof toNodeHandler>[0];
type GetSession = (req: Request) => Promise<{ user: unknown; session: unknown } | null>;

export function getApp(auth: AuthHandler, getSession: GetSession, callback?: (app: express.Express) => void) {
    const app = express();

    // https://www.better-auth.com/docs/installation
    // Must be mounted before the body parsing middleware
    app.all("/api/auth/{*any}", toNodeHandler(auth));

    app.get("/", (req, res) => {
        res.status(200).redirect("api/auth/reference"); // OpenAPI reference
    });

    app.use(express.json());
    app.use(express.urlencoded({ extended: false }));

    app.get("/me", async (req, res) => {
        const session = await getSession(req);
        if (!session) {
            res.status(401).json({ message: "Not authenticated" });
            return;
        }
        
        res.status(200).json({
            user: session.user,
            session: session.session
        });
    });

    if (callback) {
        callback(app);
    }

    app.use((req, res, next) => {
        res.status(404).json({ message: "Route not found" });
    });

    // Error handler, always last
    const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
        console.error("Server error:", err);
        res.status(err.status || 500).json({ message: err.message || "Internal server error" });
    };
    app.use(errorHandler);

    return app;
}
