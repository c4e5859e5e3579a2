import type { NextFunction, Request, Response } from "express";
import { createHash, timingSafeEqual } from "crypto";
import { API_KEY_HEADER, httpStatusCode } from "src/lib/constant";
import { toStoreError } from "src/lib/errors/app-errors";
import { errorResponseHandler, formatErrorResponse } from "src/lib/errors/error-response-handler";

export type ApiKeyHashLoader = () => Promise<string | null>;

export const hashApiKey = (apiKey: string) => createHash("sha3-256").update(apiKey).digest("hex");

const unauthorized = (res: Response) =>
    res.status(httpStatusCode.UNAUTHORIZED).json({ success: false, message: "Unauthorized" });

export const createCheckApiKey = (loadApiKeyHash: ApiKeyHashLoader) =>
    async (req: Request, res: Response, next: NextFunction) => {
        const apiKey = req.header(API_KEY_HEADER);
        if (!apiKey) {
            console.error("Unauthorized call to API: No key header received");
            return unauthorized(res);
        }

        try {
            const expectedHash = await loadApiKeyHash();
            if (!expectedHash) {
                return errorResponseHandler("API key is not configured", httpStatusCode.INTERNAL_SERVER_ERROR);
            }

            const provided = Buffer.from(hashApiKey(apiKey));
            const expected = Buffer.from(expectedHash.toLowerCase());
            if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
                console.error("Unauthorized call to API: Incorrect key supplied");
                return unauthorized(res);
            }
        } catch (error) {
            return formatErrorResponse(res, toStoreError(error));
        }

        next();
    };
