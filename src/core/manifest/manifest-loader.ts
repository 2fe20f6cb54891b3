// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import {parseAllDocuments} from 'yaml';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeckhandLogger} from '../logging/deckhand-logger.js';
import {ManifestLoadError} from '../errors/manifest-load-error.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {Comparators} from '../../business/utils/comparators.js';
import * as constants from '../constants.js';
import {isDns1123Label, isDns1123Subdomain} from '../../integration/kube/kube-validation.js';
import {NamespaceName} from '../../integration/kube/resources/namespace/namespace-name.js';
import {ResourceType} from '../../integration/kube/resources/resource-type.js';
import {type KubeObject, type KubeObjectMetadata, KubeObjects} from '../../integration/kube/resources/object/kube-object.js';
import {ResourceKey} from './resource-key.js';
import {type Manifest, type ManifestSet} from './manifest.js';
import {VariableInterpolator, type Variables} from './variable-interpolator.js';

export interface LoadOptions {
  /** descend into sub-directories */
  recursive?: boolean;
  /** namespace given to namespaced manifests that do not name one */
  defaultNamespace?: NamespaceName;
  /** values for `${NAME}` placeholders, the process environment when omitted */
  variables?: Variables;
}

const RESERVED_METADATA_FIELDS = new Set(['name', 'namespace', 'labels', 'annotations']);

interface ResolvedLoadOptions {
  recursive: boolean;
  defaultNamespace: NamespaceName;
  variables: Variables;
}

/**
 * Reads manifests from YAML and JSON files.
 */
@injectable()
export class ManifestLoader {
  public constructor(@inject(InjectTokens.DeckhandLogger) private readonly logger: DeckhandLogger) {
    this.logger = patchInject(logger, InjectTokens.DeckhandLogger, this.constructor.name);
  }

  /**
   * Loads every manifest file of a directory.
   *
   * @param directory - directory holding `.yaml`, `.yml` or `.json` files
   * @param options - load options
   * @throws ManifestLoadError if the directory is missing or empty, or any document is invalid
   */
  public load(directory: string, options: LoadOptions = {}): ManifestSet {
    const resolved = ManifestLoader.resolveOptions(options);

    if (!fs.existsSync(directory)) {
      throw new ManifestLoadError('directory does not exist', directory);
    }
    if (!fs.statSync(directory).isDirectory()) {
      throw new ManifestLoadError('not a directory', directory);
    }

    const files = this.listManifestFiles(directory, resolved.recursive)
      .map(file => PathEx.relative(directory, file))
      .sort(Comparators.string);
    if (files.length === 0) {
      throw new ManifestLoadError(
        `no manifest files found (${constants.MANIFEST_FILE_EXTENSIONS.join(', ')})`,
        directory,
      );
    }

    const manifests: Manifest[] = [];
    const seen = new Map<string, Manifest>();
    for (const file of files) {
      for (const manifest of this.readFile(PathEx.join(directory, file), resolved)) {
        const previous = seen.get(manifest.key.toString());
        if (previous) {
          throw new ManifestLoadError(
            `duplicate resource ${manifest.key} (also defined in ${previous.source})`,
            manifest.source,
          );
        }
        seen.set(manifest.key.toString(), manifest);
        manifests.push(manifest);
      }
    }

    this.logger.debug(`loaded ${manifests.length} manifests from ${files.length} files in ${directory}`);
    return manifests;
  }

  /**
   * Loads the manifests of a single file.
   *
   * @throws ManifestLoadError if the file is missing or any document is invalid
   */
  public loadFile(file: string, options: LoadOptions = {}): ManifestSet {
    if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
      throw new ManifestLoadError('file does not exist', file);
    }

    const manifests = this.readFile(file, ManifestLoader.resolveOptions(options));
    const seen = new Map<string, Manifest>();
    for (const manifest of manifests) {
      const key = manifest.key.toString();
      const previous = seen.get(key);
      if (previous) {
        throw new ManifestLoadError(
          `duplicate resource ${key} (documents ${previous.documentIndex} and ${manifest.documentIndex})`,
          file,
        );
      }
      seen.set(key, manifest);
    }
    return manifests;
  }

  private static resolveOptions(options: LoadOptions): ResolvedLoadOptions {
    return {
      recursive: options.recursive ?? false,
      defaultNamespace: options.defaultNamespace ?? constants.DEFAULT_NAMESPACE,
      variables: options.variables ?? process.env,
    };
  }

  private listManifestFiles(directory: string, recursive: boolean): string[] {
    const files: string[] = [];
    for (const entry of fs.readdirSync(directory, {withFileTypes: true})) {
      const entryPath = PathEx.join(directory, entry.name);
      if (entry.isDirectory()) {
        if (recursive) {
          files.push(...this.listManifestFiles(entryPath, recursive));
        }
      } else if (constants.MANIFEST_FILE_EXTENSIONS.includes(path.extname(entry.name).toLowerCase())) {
        files.push(entryPath);
      }
    }
    return files;
  }

  private readFile(file: string, options: ResolvedLoadOptions): Manifest[] {
    let text: string;
    try {
      text = fs.readFileSync(file, 'utf8');
    } catch (error) {
      throw new ManifestLoadError('unable to read file', file, error);
    }

    text = VariableInterpolator.interpolate(text, options.variables, file);

    const manifests: Manifest[] = [];
    const documents = ManifestLoader.parseDocuments(text, file);
    documents.forEach((document, documentIndex) => {
      if (document === null || document === undefined) {
        return;
      }
      if (!KubeObjects.isRecord(document)) {
        throw new ManifestLoadError(`document ${documentIndex} is not a mapping`, file);
      }

      for (const item of ManifestLoader.expandList(document, file, documentIndex)) {
        const object = ManifestLoader.validate(item, file, documentIndex, options.defaultNamespace);
        manifests.push({
          key: ResourceKey.of(
            object.kind,
            object.metadata.name,
            object.metadata.namespace ? NamespaceName.of(object.metadata.namespace) : undefined,
          ),
          object,
          source: file,
          documentIndex,
        });
      }
    });

    this.logger.debug(`read ${manifests.length} manifests from ${file}`);
    return manifests;
  }

  private static parseDocuments(text: string, file: string): unknown[] {
    if (path.extname(file).toLowerCase() === '.json') {
      if (!text.trim()) {
        return [];
      }
      try {
        const parsed: unknown = JSON.parse(text);
        return [parsed];
      } catch (error) {
        throw new ManifestLoadError(`invalid JSON: ${ManifestLoader.messageOf(error)}`, file, error);
      }
    }

    const values: unknown[] = [];
    for (const document of parseAllDocuments(text)) {
      const [error] = document.errors;
      if (error) {
        throw new ManifestLoadError(`invalid YAML in document ${values.length}: ${error.message}`, file, error);
      }
      const value: unknown = document.toJS();
      values.push(value);
    }
    return values;
  }

  /** `*List` documents carrying an `items` array stand for their items */
  private static expandList(
    document: Record<string, unknown>,
    file: string,
    documentIndex: number,
  ): Record<string, unknown>[] {
    const kind = document.kind;
    const items = document.items;
    if (typeof kind !== 'string' || !kind.endsWith('List') || !Array.isArray(items)) {
      return [document];
    }

    return items.map((item: unknown, itemIndex: number) => {
      if (!KubeObjects.isRecord(item)) {
        throw new ManifestLoadError(`item ${itemIndex} of document ${documentIndex} is not a mapping`, file);
      }
      return item;
    });
  }

  private static validate(
    document: Record<string, unknown>,
    file: string,
    documentIndex: number,
    defaultNamespace: NamespaceName,
  ): KubeObject {
    const fail = (message: string): never => {
      throw new ManifestLoadError(`document ${documentIndex}: ${message}`, file);
    };

    const {apiVersion, kind, metadata} = document;
    if (typeof apiVersion !== 'string' || !apiVersion) {
      return fail('missing apiVersion');
    }
    if (typeof kind !== 'string' || !kind) {
      return fail('missing kind');
    }
    if (!KubeObjects.isRecord(metadata)) {
      return fail(`${kind} is missing metadata`);
    }

    const name = metadata.name;
    if (typeof name !== 'string' || !name) {
      return fail(`${kind} is missing metadata.name`);
    }
    if (!isDns1123Subdomain(name)) {
      return fail(
        `${kind} name '${name}' is invalid, must be a valid RFC-1123 DNS subdomain ` +
          "(lower case alphanumeric characters, '-' or '.', at most 253 characters)",
      );
    }
    if (kind === ResourceType.NAMESPACE && !isDns1123Label(name)) {
      return fail(`Namespace name '${name}' is invalid, must be a valid RFC-1123 DNS label`);
    }

    const labels = ManifestLoader.stringMap(metadata.labels, `${kind}/${name} metadata.labels`, fail);
    const annotations = ManifestLoader.stringMap(metadata.annotations, `${kind}/${name} metadata.annotations`, fail);

    let namespace: string | undefined;
    const declaredNamespace: unknown = metadata.namespace;
    if (declaredNamespace !== undefined && declaredNamespace !== null) {
      if (typeof declaredNamespace !== 'string' || !isDns1123Label(declaredNamespace)) {
        return fail(
          `${kind}/${name} namespace '${String(declaredNamespace)}' is invalid, must be a valid RFC-1123 DNS label`,
        );
      }
      namespace = declaredNamespace;
    }

    if (ResourceKey.isClusterScoped(kind)) {
      if (namespace) {
        return fail(`${kind}/${name} is cluster-scoped and must not declare a namespace`);
      }
    } else if (!namespace) {
      namespace = defaultNamespace.name;
    }

    const objectMetadata: KubeObjectMetadata = {name};
    for (const [field, value] of Object.entries(metadata)) {
      if (!RESERVED_METADATA_FIELDS.has(field)) {
        objectMetadata[field] = value;
      }
    }
    if (namespace) {
      objectMetadata.namespace = namespace;
    }
    if (labels) {
      objectMetadata.labels = labels;
    }
    if (annotations) {
      objectMetadata.annotations = annotations;
    }

    return {...document, apiVersion, kind, metadata: objectMetadata};
  }

  private static stringMap(
    value: unknown,
    field: string,
    fail: (message: string) => never,
  ): Record<string, string> | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!KubeObjects.isRecord(value)) {
      return fail(`${field} must be a mapping`);
    }

    const result: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry !== 'string') {
        return fail(`${field}.${key} must be a string`);
      }
      result[key] = entry;
    }
    return result;
  }

  private static messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
