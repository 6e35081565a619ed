/**
 * Identity loading
 * ---------------------------------------------
 * Decodes a password-protected PKCS#12 credential bundle, logs every
 * certificate it carries, and keeps the first one that has a matching
 * private key. Every other entry is disposed, on success and on failure.
 */
import { readFileSync } from 'fs';
import forge from 'node-forge';
import { SERVICE } from './config.js';
import { CredentialError, errorMessage } from './errors.js';
import type { Identity } from './types.js';

const KEY_BAG_TYPES = [forge.pki.oids.pkcs8ShroudedKeyBag, forge.pki.oids.keyBag];

export function certificateThumbprint(cert: forge.pki.Certificate): string {
  const der = forge.asn1.toDer(forge.pki.certificateToAsn1(cert)).getBytes();
  return forge.md.sha1.create().update(der).digest().toHex().toUpperCase();
}

export function certificateSubject(cert: forge.pki.Certificate): string {
  return cert.subject.attributes
    .map((attr) => `${attr.shortName ?? attr.name ?? attr.type}=${String(attr.value)}`)
    .join(', ');
}

function commonName(cert: forge.pki.Certificate): string | undefined {
  const field: unknown = cert.subject.getField('CN');
  if (!field || typeof field !== 'object' || !('value' in field)) return undefined;
  return typeof field.value === 'string' && field.value ? field.value : undefined;
}

// Bag attributes are untyped in node-forge; localKeyId is an array of binary strings
function localKeyId(bag: forge.pkcs12.Bag): string | undefined {
  const attributes: unknown = bag.attributes;
  if (!attributes || typeof attributes !== 'object' || !('localKeyId' in attributes)) return undefined;
  const ids = attributes.localKeyId;
  return Array.isArray(ids) && typeof ids[0] === 'string' ? forge.util.bytesToHex(ids[0]) : undefined;
}

/** One certificate decoded from a bundle, holding its key material until disposed. */
export class CertificateEntry {
  readonly thumbprint: string;
  readonly subject: string;
  readonly hasPrivateKey: boolean;
  private cert: forge.pki.Certificate | null;
  private key: forge.pki.PrivateKey | null;

  constructor(cert: forge.pki.Certificate, key?: forge.pki.PrivateKey) {
    this.cert = cert;
    this.key = key ?? null;
    this.thumbprint = certificateThumbprint(cert);
    this.subject = certificateSubject(cert);
    this.hasPrivateKey = Boolean(key);
  }

  get disposed(): boolean {
    return this.cert === null;
  }

  dispose(): void {
    this.cert = null;
    this.key = null;
  }

  toIdentity(): Identity {
    if (!this.cert) throw new CredentialError(`certificate ${this.thumbprint} was already disposed`);
    if (!this.key) throw new CredentialError(`certificate ${this.thumbprint} has no private key`);
    const registrationId = commonName(this.cert);
    if (!registrationId) {
      throw new CredentialError(`certificate ${this.thumbprint} has no subject common name to register with`);
    }
    return Object.freeze({
      certificatePem: forge.pki.certificateToPem(this.cert),
      privateKeyPem: forge.pki.privateKeyToPem(this.key),
      thumbprint: this.thumbprint,
      subject: this.subject,
      registrationId,
    });
  }
}

/**
 * Every entry of one bundle. `retain()` marks the entry the caller keeps;
 * `dispose()` releases all the others.
 */
export class CertificateCollection {
  private retained: CertificateEntry | null = null;

  constructor(readonly entries: readonly CertificateEntry[]) {}

  static fromPkcs12(der: Buffer, password: string): CertificateCollection {
    let p12: forge.pkcs12.Pkcs12Pfx;
    try {
      const asn1 = forge.asn1.fromDer(der.toString('binary'));
      p12 = forge.pkcs12.pkcs12FromAsn1(asn1, password);
    } catch (e) {
      throw new CredentialError(`failed to decrypt credential bundle: ${errorMessage(e)}`, { cause: e });
    }

    const certBags = p12.getBags({ bagType: forge.pki.oids.certBag })[forge.pki.oids.certBag] ?? [];
    const keyBags = KEY_BAG_TYPES.flatMap((bagType) => p12.getBags({ bagType })[bagType] ?? []);
    const keysById = new Map<string, forge.pki.PrivateKey>();
    for (const bag of keyBags) {
      const id = localKeyId(bag);
      if (id && bag.key) keysById.set(id, bag.key);
    }
    // Bundles written without localKeyId: pair a lone key with a lone certificate
    const lonePair = keysById.size === 0 && keyBags.length === 1 && certBags.length === 1;

    const entries: CertificateEntry[] = [];
    for (const bag of certBags) {
      if (!bag.cert) continue;
      const id = localKeyId(bag);
      const key = id ? keysById.get(id) : lonePair ? keyBags[0].key : undefined;
      entries.push(new CertificateEntry(bag.cert, key));
    }
    return new CertificateCollection(entries);
  }

  /** First entry carrying a private key, in bundle order. */
  firstWithPrivateKey(): CertificateEntry | undefined {
    return this.entries.find((entry) => entry.hasPrivateKey);
  }

  retain(entry: CertificateEntry): void {
    if (!this.entries.includes(entry)) throw new CredentialError('entry does not belong to this bundle');
    this.retained = entry;
  }

  dispose(): void {
    for (const entry of this.entries) {
      if (entry !== this.retained) entry.dispose();
    }
  }
}

export function selectIdentity(collection: CertificateCollection, source = 'credential bundle'): Identity {
  try {
    for (const entry of collection.entries) {
      console.log(`[${SERVICE}] found certificate: ${entry.thumbprint} ${entry.subject}; privateKey: ${entry.hasPrivateKey}`);
    }
    const selected = collection.firstWithPrivateKey();
    if (!selected) throw new CredentialError(`${source} did not contain any certificate with a private key`);
    const identity = selected.toIdentity();
    collection.retain(selected);
    console.log(`[${SERVICE}] using certificate ${identity.thumbprint} ${identity.subject}`);
    return identity;
  } finally {
    collection.dispose();
  }
}

export function loadIdentity(bundlePath: string, bundlePassword: string): Identity {
  let der: Buffer;
  try {
    der = readFileSync(bundlePath);
  } catch (e) {
    throw new CredentialError(`failed to read credential bundle ${bundlePath}: ${errorMessage(e)}`, { cause: e });
  }
  return selectIdentity(CertificateCollection.fromPkcs12(der, bundlePassword), bundlePath);
}
