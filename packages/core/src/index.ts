// @ember/core: Foundation
export * from "./errors.js";
export {
	DEFAULT_SETTINGS,
	SETTING_KEYS,
	createSettingsStore,
	loadSettingsStore,
	defaultSettingsPath,
	getEmberHome,
	expandHome,
	isSettingKey,
} from "./config.js";
export type {
	Settings,
	SettingKey,
	SettingsStore,
	SettingsListener,
	LogLevelName,
	EmbeddingCachePolicy,
} from "./config.js";

export { isRecord, v } from "./validation.js";
export type { Check, ValidatorFn } from "./validation.js";

export { RwLock } from "./locks.js";
export type { Release } from "./locks.js";
export { AsyncQueue, Broadcaster, DEFAULT_BROADCAST_CAPACITY } from "./channels.js";
export type { Subscription } from "./channels.js";

export * from "./observability/index.js";
