export { createApp, type AppDependencies } from "./app"
export { loadConfig, type AppConfig } from "./configF/env"
export { default as connectDB, disconnectDB } from "./configF/db"
export { AppError, IntegrityError, UnavailableError, ValidationError } from "./lib/errors/app-errors"
export { createCheckApiKey, hashApiKey, type ApiKeyHashLoader } from "./middleware/check-api-key"
export { recordLinkVisit } from "./middleware/record-link-visit"
export { LinkStatisticsStore, type LinkStatisticsStoreOptions } from "./services/link-statistics/link-statistics-service"
export { MongoLinkStatisticsRepository } from "./services/link-statistics/mongo-link-statistics-repository"
export { findGlobalApiKeyHashService } from "./services/setting/setting-service"
export type {
    CountedLinkStatistic,
    LinkStatisticRecord,
    LinkStatisticsRepository,
    NewLinkStatistic,
} from "./services/link-statistics/link-statistics-types"
