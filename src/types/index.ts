export type MetadataSourceKind = 'remote' | 'mdq' | 'local';

/** Internal attribute name → SAML attribute name, in declaration order. */
export type AttributeMapping = Record<string, string>;

export interface ValidityState {
  is_valid: boolean;
  is_active: boolean;
}

export interface ServiceProviderEntry extends ValidityState {
  id: string;
  entity_id: string;
  display_name: string;
  metadata_url: string;
  description: string;
  agreement_screen: boolean;
  agreement_consent_form: boolean;
  agreement_message: string;
  signing_algorithm: string;
  digest_algorithm: string;
  disable_encrypted_assertions: boolean;
  attribute_processor: string;
  attribute_mapping: string | null;
  force_attribute_release: boolean;
  created: Date;
  updated: Date;
  last_seen: Date | null;
}

export type ServiceProviderInput = Partial<
  Omit<ServiceProviderEntry, 'id' | 'created' | 'updated' | 'last_seen' | 'is_valid'>
> & {
  entity_id: string;
  display_name: string;
};

export interface MetadataSourceEntry extends ValidityState {
  id: string;
  name: string;
  type: MetadataSourceKind;
  url: string | null;
  file: string | null;
  kwargs: string;
  created: Date;
  updated: Date;
}

export type MetadataSourceInput = Partial<
  Omit<MetadataSourceEntry, 'id' | 'created' | 'updated' | 'is_valid'>
> & {
  name: string;
  type: MetadataSourceKind;
};

/** Stored edits. The validity pair is only ever written by validation. */
export type ServiceProviderChanges = Partial<Omit<ServiceProviderInput, 'is_active'>>;
export type MetadataSourceChanges = Partial<Omit<MetadataSourceInput, 'is_active'>>;

export interface AgreementRecord {
  id: string;
  user_id: string;
  sp_entity_id: string;
  attrs: string;
  created: Date;
}

export interface PersistentIdentifier {
  id: string;
  sp_id: string;
  user_id: string;
  persistent_id: string;
  created: Date;
}

/** Per-SP settings handed to the SAML protocol binding. */
export interface SPConfig {
  processor: string;
  attribute_mapping: AttributeMapping;
  force_attribute_release: boolean;
  display_name: string;
  display_description: string;
  display_agreement_message: string;
  signing_algorithm: string;
  digest_algorithm: string;
  disable_encrypted_assertions: boolean;
  show_user_agreement_screen: boolean;
  display_agreement_consent_form: boolean;
}

export type SPConfigSnapshot = Record<string, SPConfig>;

export interface RemoteSourceDescriptor {
  url: string;
  cert?: string;
  [option: string]: unknown;
}

export type SourceDescriptor = string | RemoteSourceDescriptor;

export type MetadataSourceSnapshot = Partial<Record<MetadataSourceKind, SourceDescriptor[]>>;

/** A loadable source under the kind it was declared with. */
export interface ActiveSource {
  type: MetadataSourceKind;
  descriptor: SourceDescriptor;
}

export interface LocationDescriptor {
  kind: 'path' | 'url';
  value: string;
}

/** User record as handed over by the authentication layer. */
export type UserRecord = Record<string, unknown>;
