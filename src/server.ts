import { createApp } from "./app"
import { loadConfig } from "./configF/env"
import connectDB, { disconnectDB } from "./configF/db"
import { LinkStatisticsStore } from "./services/link-statistics/link-statistics-service"
import { MongoLinkStatisticsRepository } from "./services/link-statistics/mongo-link-statistics-repository"
import { findGlobalApiKeyHashService } from "./services/setting/setting-service"

const start = async () => {
    const config = loadConfig()
    await connectDB(config)

    const store = new LinkStatisticsStore(
        new MongoLinkStatisticsRepository(config.queryTimeoutMs),
        { maxTextLength: config.maxStatisticTextLength }
    )
    const app = createApp({
        store,
        loadApiKeyHash: () => findGlobalApiKeyHashService(config.queryTimeoutMs),
    })

    const server = app.listen(config.port, () => console.log(`Server is listening on port ${config.port}`))

    const shutdown = (signal: string) => {
        console.log(`${signal} received, shutting down`)
        server.close(() => {
            disconnectDB()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    console.error("Error while disconnecting from MongoDB:", error)
                    process.exit(1)
                })
        })
    }

    process.once("SIGINT", () => shutdown("SIGINT"))
    process.once("SIGTERM", () => shutdown("SIGTERM"))
}

start().catch((error: unknown) => {
    console.error("Failed to start server:", error)
    process.exit(1)
})
