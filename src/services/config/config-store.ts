import Conf from 'conf'
import { z } from 'zod'
import { DEFAULT_SETTINGS, type FeedbackSettings } from '@/types/settings'

const nonNegativeMs = z.number().nonnegative()

export const feedbackSettingsSchema = z
  .object({
    analysis: z.object({
      intervalMs: nonNegativeMs,
      curlTolerance: z.number().min(0).max(1),
      debugMode: z.boolean(),
    }),
    stability: z.object({
      messageEnterDelayMs: nonNegativeMs,
      messageExitDelayMs: nonNegativeMs,
      maxMessages: z.number().int().min(1),
    }),
    timing: z
      .object({
        successDisplayDurationMs: nonNegativeMs,
        errorMessageHoldMinMs: nonNegativeMs,
        errorMessageHoldMaxMs: nonNegativeMs,
        dynamicSuccessHoldDurationMs: nonNegativeMs,
      })
      .refine((t) => t.errorMessageHoldMinMs <= t.errorMessageHoldMaxMs, {
        message: 'errorMessageHoldMinMs must not exceed errorMessageHoldMaxMs',
      }),
    dynamic: z.object({
      nearCompletionThreshold: z.number().gt(0).max(1),
      messageCooldownMs: nonNegativeMs,
    }),
  })
  .strict()

export type SettingsPatch = {
  readonly [K in keyof FeedbackSettings]?: Partial<FeedbackSettings[K]>
}

interface StoreSchema {
  settings: FeedbackSettings
}

export interface ConfigStoreOptions {
  /** Directory holding the config file; the OS config dir when omitted. */
  readonly cwd?: string
  readonly configName?: string
}

export class ConfigStore {
  private readonly store: Conf<StoreSchema>

  constructor(options: ConfigStoreOptions = {}) {
    this.store = new Conf<StoreSchema>({
      projectName: 'sign-feedback-engine',
      configName: options.configName ?? 'feedback-settings',
      cwd: options.cwd,
      defaults: {
        settings: DEFAULT_SETTINGS,
      },
      clearInvalidConfig: true,
    })
  }

  /** Stored settings, or the defaults when what is stored does not validate. */
  getSettings(): FeedbackSettings {
    const parsed = feedbackSettingsSchema.safeParse(this.store.get('settings'))
    if (!parsed.success) {
      console.warn(
        `[ConfigStore] Invalid stored settings, using defaults: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`,
      )
      return DEFAULT_SETTINGS
    }
    return parsed.data
  }

  /** Throws a ZodError when `settings` is invalid; nothing is written then. */
  setSettings(settings: FeedbackSettings): void {
    this.store.set('settings', feedbackSettingsSchema.parse(settings))
  }

  updateSettings(patch: SettingsPatch): FeedbackSettings {
    const current = this.getSettings()
    const next: FeedbackSettings = {
      analysis: { ...current.analysis, ...patch.analysis },
      stability: { ...current.stability, ...patch.stability },
      timing: { ...current.timing, ...patch.timing },
      dynamic: { ...current.dynamic, ...patch.dynamic },
    }
    this.setSettings(next)
    return next
  }

  getPath(): string {
    return this.store.path
  }

  clear(): void {
    this.store.clear()
  }
}
