/**
 * @fileoverview App Configuration Store
 * Holds the loaded server settings, shared context and library list. The
 * HTTP surface and the refresh orchestrator read from here; `/reload` and
 * startup write to it.
 */

import { createStore } from "zustand/vanilla";
import { Library, type LibraryOptions } from "../ingest/library";
import { ServerConfigSchema, type AppConfig, type ResolvedContext, type ServerConfig } from "../types/config";
import { DEFAULT_API_URL, DEFAULT_BASE_URL, DEFAULT_VOCAB } from "../constants/namespaces";
import type { LibraryEnvironment } from "../types/library";

interface AppConfigState {
  config: AppConfig;
  /** Libraries built from `config.libraries`, rebuilt whenever the config changes. */
  libraries: Library[];
  libraryOptions: LibraryOptions;

  setConfig: (config: AppConfig) => void;
  setLibraryOptions: (opts: LibraryOptions) => void;
  updateServer: (patch: Partial<ServerConfig>) => void;
  resetConfig: () => void;
}

const defaultContext: ResolvedContext = {
  vocab: DEFAULT_VOCAB,
  apiUrl: DEFAULT_API_URL,
  baseUrl: DEFAULT_BASE_URL,
};

export const defaultConfig = (): AppConfig => ({
  server: ServerConfigSchema.parse({}),
  context: { ...defaultContext },
  libraries: [],
  sources: {},
});

export function libraryEnvironment(config: AppConfig): LibraryEnvironment {
  return {
    vocab: config.context.vocab,
    apiUrl: config.context.apiUrl,
    baseUrl: config.context.baseUrl,
    importDirectory: config.server.import_directory,
  };
}

function buildLibraries(config: AppConfig, opts: LibraryOptions): Library[] {
  const env = libraryEnvironment(config);
  return config.libraries.map((raw) => new Library(raw, env, opts));
}

export const appConfigStore = createStore<AppConfigState>()((set, get) => ({
  config: defaultConfig(),
  libraries: [],
  libraryOptions: {},

  setConfig: (config) => set({ config, libraries: buildLibraries(config, get().libraryOptions) }),

  setLibraryOptions: (libraryOptions) =>
    set((state) => ({ libraryOptions, libraries: buildLibraries(state.config, libraryOptions) })),

  updateServer: (patch) =>
    set((state) => {
      const config = { ...state.config, server: { ...state.config.server, ...patch } };
      return { config, libraries: buildLibraries(config, state.libraryOptions) };
    }),

  resetConfig: () => set({ config: defaultConfig(), libraries: [], libraryOptions: {} }),
}));

export const getAppConfig = (): AppConfig => appConfigStore.getState().config;

export const getLibraries = (): Library[] => appConfigStore.getState().libraries;
