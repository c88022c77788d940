/**
 * resumecraft core
 *
 * Types, schemas, errors and configuration shared by the pipeline and CLI
 */

export type {
  UserProfile,
  ResumeStyle,
  GenerationSettings,
  LayoutBlock,
  RenderedDocument,
  ResumeRecord,
  ArtifactSet,
} from "./types";

export { RESUME_STYLES } from "./types";
export { UserProfileSchema, ResumeStyleSchema, GenerationSettingsSchema, CredentialsSchema } from "./schemas";
export { createConfig, loadCredentials, type AppConfig, type Credentials } from "./config";
export * from "./errors";
