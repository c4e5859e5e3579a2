import express, { type NextFunction, type Request, type Response } from "express"
import cors from "cors"
import { createLinkStatisticsRouter } from "./routes"
import { createCheckApiKey, type ApiKeyHashLoader } from "./middleware/check-api-key"
import { httpStatusCode } from "./lib/constant"
import { formatErrorResponse } from "./lib/errors/error-response-handler"
import { AppError, ValidationError } from "./lib/errors/app-errors"
import type { LinkStatisticsStore } from "./services/link-statistics/link-statistics-service"

const clientErrorStatus = (error: unknown): number | null => {
    if (!(error instanceof Error) || !("status" in error) || typeof error.status !== "number") return null
    return error.status >= 400 && error.status < 500 ? error.status : null
}

// body-parser rejects a body with an http-errors error carrying a 4xx status and a type
const toRequestError = (error: unknown): unknown => {
    const status = clientErrorStatus(error)
    if (status === null || !(error instanceof Error)) return error
    if (error instanceof SyntaxError) return new ValidationError("Malformed JSON body")
    if ("type" in error && error.type === "entity.too.large") return new ValidationError("Request body is too large")
    return new AppError(error.message, status)
}

export interface AppDependencies {
    store: LinkStatisticsStore
    loadApiKeyHash: ApiKeyHashLoader
}

export const createApp = ({ store, loadApiKeyHash }: AppDependencies) => {
    const app = express()

    app.use(express.json());

    app.use(
        cors({
            origin: "*",
            methods: ['GET', 'POST'],
        })
    );

    app.get("/health", (_, res: Response) => {
        res.status(httpStatusCode.OK).send("Service is healthy");
    });

    app.use("/api/links", createLinkStatisticsRouter(store, createCheckApiKey(loadApiKeyHash)));

    app.use((req: Request, res: Response) => {
        res.status(httpStatusCode.NOT_FOUND).json({ success: false, message: `Endpoint not found: ${req.method} ${req.path}` });
    });

    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        return formatErrorResponse(res, toRequestError(error));
    });

    return app
}
