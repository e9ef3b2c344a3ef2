import { Effect, Schema } from "effect";
import { FileSystem } from "@effect/platform";
import { decode as parseIni } from "ini";
import type { ParseError } from "effect/ParseResult";
import {
  ConfigDocumentSchema,
  EMPTY_CHARGE_CONFIG,
  FULL_CHARGE_SECTION,
  PLUGS_SECTION,
  ProfileSectionsSchema,
  ReservedSectionsSchema,
  SETTINGS_SECTION,
  STORAGE_SECTION,
  type ChargeConfig,
} from "./schema.js";
import { ConfigFileInvalidError, ConfigFileNotFoundError } from "./errors.js";

const RESERVED_SECTIONS: ReadonlyArray<string> = [PLUGS_SECTION, STORAGE_SECTION, FULL_CHARGE_SECTION, SETTINGS_SECTION];

/**
 * Decodes a parsed config document. Every section that is not one of the
 * reserved sections is a manufacturer profile. Profiles are not checked for
 * required keys here, the profile resolver decides what to do with those.
 */
export const decodeChargeConfig = (document: unknown): Effect.Effect<ChargeConfig, ParseError> =>
  Effect.gen(function* () {
    if (document === undefined || document === null) {
      return EMPTY_CHARGE_CONFIG;
    }

    const sections = yield* Schema.decodeUnknown(ConfigDocumentSchema)(document);
    const reserved = yield* Schema.decodeUnknown(ReservedSectionsSchema)(sections);
    const profiles = yield* Schema.decodeUnknown(ProfileSectionsSchema)(
      Object.fromEntries(
        Object.entries(sections).filter(([name]) => !RESERVED_SECTIONS.includes(name))
      )
    );

    const storage = [...new Set(reserved.Storage)];

    return {
      profiles,
      plugs: reserved.Plugs,
      storage,
      // Storage wins over FullCharge
      fullCharge: [...new Set(reserved.FullCharge)].filter((name) => !storage.includes(name)),
      settings: reserved.Settings,
    };
  });

export const loadChargeConfig = (
  path: string | undefined
): Effect.Effect<ChargeConfig, ConfigFileNotFoundError | ConfigFileInvalidError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (path === undefined) {
      yield* Effect.logInfo('No config file given, using built-in defaults');
      return EMPTY_CHARGE_CONFIG;
    }

    const fs = yield* FileSystem.FileSystem;

    const exists = yield* fs.exists(path).pipe(
      Effect.mapError((err) => new ConfigFileInvalidError({ path, reason: err.message }))
    );
    if (!exists) {
      return yield* new ConfigFileNotFoundError({ path });
    }

    const text = yield* fs.readFileString(path).pipe(
      Effect.mapError((err) => new ConfigFileInvalidError({ path, reason: err.message }))
    );

    const document = yield* Effect.try({
      try: () => parseIni(text),
      catch: (err) => new ConfigFileInvalidError({ path, reason: err instanceof Error ? err.message : String(err) }),
    });

    const config = yield* decodeChargeConfig(document).pipe(
      Effect.mapError((err) => new ConfigFileInvalidError({ path, reason: err.message }))
    );

    yield* Effect.logInfo(`Loaded config file ${path}`, {
      profiles: Object.keys(config.profiles),
      plugs: Object.keys(config.plugs).length,
    });

    return config;
  });
