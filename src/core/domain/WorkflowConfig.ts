import { Config, Data, Effect, pipe } from "effect"

/**
 * The five paths a run works with. Built once at process start and passed
 * by parameter; nothing reads it from ambient state.
 */
export interface WorkflowConfig {
  /** Encrypted disk image holding the secure profile */
  readonly imagePath: string
  /** Credential manager opened so the user can look up the image password */
  readonly credentialManagerPath: string
  readonly browserPath: string
  /** Absolute, or relative to the mount point of the image */
  readonly secureProfilePath: string
  /** Fallback profile on the regular filesystem, may start with ~ */
  readonly personalProfilePath: string
}

export class InvalidConfiguration extends Data.TaggedError("InvalidConfiguration")<{
  readonly reason: string
}> {}

export const defaultWorkflowConfig: WorkflowConfig = {
  imagePath: "~/Movies/Profile.dmg",
  credentialManagerPath: "/Applications/Proton Pass.app",
  browserPath: "/Applications/Zen.app",
  secureProfilePath: "/Volumes/Profile Secure/Secure",
  personalProfilePath: "~/Library/Application Support/zen/Profiles/Personal",
}

export const configEnvVars = {
  imagePath: "PROFILE_VAULT_IMAGE",
  credentialManagerPath: "PROFILE_VAULT_CREDENTIAL_MANAGER",
  browserPath: "PROFILE_VAULT_BROWSER",
  secureProfilePath: "PROFILE_VAULT_SECURE_PROFILE",
  personalProfilePath: "PROFILE_VAULT_PERSONAL_PROFILE",
} as const satisfies Record<keyof WorkflowConfig, string>

const pathSetting = (key: keyof WorkflowConfig) =>
  Config.nonEmptyString(configEnvVars[key]).pipe(Config.withDefault(defaultWorkflowConfig[key]))

export const workflowConfig: Config.Config<WorkflowConfig> = Config.all({
  imagePath: pathSetting("imagePath"),
  credentialManagerPath: pathSetting("credentialManagerPath"),
  browserPath: pathSetting("browserPath"),
  secureProfilePath: pathSetting("secureProfilePath"),
  personalProfilePath: pathSetting("personalProfilePath"),
})

/**
 * Read the configuration from the active ConfigProvider (environment by default).
 */
export const loadWorkflowConfig: Effect.Effect<WorkflowConfig, InvalidConfiguration> = pipe(
  workflowConfig,
  Effect.mapError((e) => new InvalidConfiguration({ reason: String(e) }))
)
