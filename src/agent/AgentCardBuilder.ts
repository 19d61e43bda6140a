import type {
  AgentCard,
  AgentSkill,
  AgentCapabilities,
  AgentExtension,
  AgentProvider,
  SecurityScheme,
} from '../types/agent-card.js';
import type { MediaType } from '../types/part.js';

/** Fluent builder for constructing an AgentCard. */
export class AgentCardBuilder {
  private readonly card: Partial<AgentCard> = {};

  name(name: string): this {
    this.card.name = name;
    return this;
  }

  description(description: string): this {
    this.card.description = description;
    return this;
  }

  version(version: string): this {
    this.card.version = version;
    return this;
  }

  url(url: string): this {
    this.card.url = url;
    return this;
  }

  protocolVersion(version: string): this {
    this.card.protocolVersion = version;
    return this;
  }

  supportedVersion(version: string): this {
    if (!this.card.supportedVersions) this.card.supportedVersions = [];
    this.card.supportedVersions.push(version);
    return this;
  }

  capabilities(caps: AgentCapabilities): this {
    this.card.capabilities = { ...this.card.capabilities, ...caps };
    return this;
  }

  extension(extension: AgentExtension): this {
    const caps = this.card.capabilities ?? {};
    this.card.capabilities = { ...caps, extensions: [...(caps.extensions ?? []), extension] };
    return this;
  }

  skill(skill: AgentSkill): this {
    if (!this.card.skills) this.card.skills = [];
    this.card.skills.push(skill);
    return this;
  }

  defaultInputModes(modes: MediaType[]): this {
    this.card.defaultInputModes = modes;
    return this;
  }

  defaultOutputModes(modes: MediaType[]): this {
    this.card.defaultOutputModes = modes;
    return this;
  }

  securityScheme(name: string, scheme: SecurityScheme, scopes: string[] = []): this {
    this.card.securitySchemes = { ...this.card.securitySchemes, [name]: scheme };
    if (!this.card.security) this.card.security = [];
    this.card.security.push({ [name]: scopes });
    return this;
  }

  extendedCard(supported = true): this {
    this.card.supportsAuthenticatedExtendedCard = supported;
    return this;
  }

  provider(provider: AgentProvider): this {
    this.card.provider = provider;
    return this;
  }

  iconUrl(url: string): this {
    this.card.iconUrl = url;
    return this;
  }

  documentationUrl(url: string): this {
    this.card.documentationUrl = url;
    return this;
  }

  /** Build the AgentCard, validating that all required fields are set. */
  build(): AgentCard {
    const { name, description, version, url, protocolVersion, skills, defaultInputModes, defaultOutputModes } =
      this.card;
    const missing: string[] = [];
    if (!name) missing.push('name');
    if (!description) missing.push('description');
    if (!version) missing.push('version');
    if (!url) missing.push('url');
    if (!protocolVersion) missing.push('protocolVersion');
    if (!skills || skills.length === 0) missing.push('skills');
    if (!defaultInputModes || defaultInputModes.length === 0) missing.push('defaultInputModes');
    if (!defaultOutputModes || defaultOutputModes.length === 0) missing.push('defaultOutputModes');

    if (
      missing.length > 0 ||
      !name ||
      !description ||
      !version ||
      !url ||
      !protocolVersion ||
      !skills ||
      !defaultInputModes ||
      !defaultOutputModes
    ) {
      throw new Error(`AgentCard missing required fields: ${missing.join(', ')}`);
    }
    if (!/^\d+\.\d+$/.test(protocolVersion)) {
      throw new Error(`protocolVersion must be "Major.Minor", got "${protocolVersion}"`);
    }

    return {
      ...this.card,
      name,
      description,
      version,
      url,
      protocolVersion,
      capabilities: this.card.capabilities ?? {},
      skills: [...skills],
      defaultInputModes,
      defaultOutputModes,
    };
  }
}
