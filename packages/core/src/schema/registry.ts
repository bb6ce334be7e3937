/**
 * SchemaRegistry
 * 인자 집합 선언 하나 → 정렬된 ArgumentDescriptor 목록 (불변)
 *
 * 순서:
 *   1. 생성자 파라미터 (선언 순서, position 0..n-1)
 *   2. 나머지 positional 인자 (position 값 순)
 *   3. named 전용 인자 (선언 순서)
 *   4. 자동 help 인자, 자동 version 인자
 *
 * 같은 선언 + 같은 스키마 관련 옵션이면 캐시된 registry를 돌려준다.
 */

import { schemaError } from '../utils/errors.js';
import { nameKey } from '../utils/naming.js';
import type { ParseOptions } from '../config.js';
import type {
  ArgumentDeclaration,
  ArgumentDescriptor,
  ArgumentSetDeclaration,
  AutomaticArgument,
  ConstructorDeclaration,
  ParsingMode,
} from './types.js';
import type { ClassValidator } from '../validation/types.js';
import {
  createAutomaticDescriptor,
  createDescriptor,
  helpNames,
  versionNames,
  type AutomaticNames,
} from './descriptor.js';

export type SchemaOptions = Pick<
  ParseOptions,
  'mode' | 'caseSensitive' | 'nameTransform' | 'nameValueSeparators' | 'autoHelpArgument' | 'autoVersionArgument'
>;

export class SchemaRegistry {
  readonly name?: string;
  readonly description?: string;
  readonly mode: ParsingMode;
  readonly caseSensitive: boolean;
  readonly descriptors: readonly ArgumentDescriptor[];
  /** position 순 */
  readonly positional: readonly ArgumentDescriptor[];
  readonly classValidators: readonly ClassValidator[];

  private readonly byName = new Map<string, ArgumentDescriptor>();
  private readonly byShortName = new Map<string, ArgumentDescriptor>();
  private readonly byMember = new Map<string, ArgumentDescriptor>();

  private constructor(declaration: ArgumentSetDeclaration, options: SchemaOptions) {
    this.name = declaration.name;
    this.description = declaration.description;
    this.mode = options.mode;
    this.caseSensitive = options.caseSensitive;

    const ctor = chooseConstructor(declaration.constructors ?? []);
    const parameters = (ctor?.parameters ?? []).map((decl, index) =>
      createDescriptor(decl, { position: index, isConstructorParameter: true }, options),
    );

    const members = declaration.arguments ?? [];
    const memberPositional = sortByPosition(members.filter(decl => decl.position !== undefined)).map(
      (decl, index) =>
        createDescriptor(decl, { position: parameters.length + index, isConstructorParameter: false }, options),
    );
    const named = members
      .filter(decl => decl.position === undefined)
      .map(decl => createDescriptor(decl, { isConstructorParameter: false }, options));

    const descriptors = [...parameters, ...memberPositional, ...named];
    this.positional = Object.freeze([...parameters, ...memberPositional]);
    checkPositionalOrder(this.positional);

    for (const descriptor of descriptors) this.register(descriptor);

    const automatic = [
      options.autoHelpArgument ? this.createAutomatic('help', helpNames(options)) : undefined,
      options.autoVersionArgument ? this.createAutomatic('version', versionNames(options)) : undefined,
    ];
    for (const descriptor of automatic) {
      if (!descriptor) continue;
      this.register(descriptor);
      descriptors.push(descriptor);
    }

    this.descriptors = Object.freeze(descriptors);
    this.classValidators = Object.freeze([...(declaration.validators ?? [])]);
    this.checkDependencies();
  }

  // ─── 조회 ───────────────────────────────────────────────────────────────

  /** 이름 또는 별칭 (long/short 모드에서는 long 이름만) */
  getArgument(name: string): ArgumentDescriptor | undefined {
    return this.byName.get(nameKey(name, this.caseSensitive));
  }

  getShortArgument(shortName: string): ArgumentDescriptor | undefined {
    return this.byShortName.get(nameKey(shortName, this.caseSensitive));
  }

  getMember(member: string): ArgumentDescriptor | undefined {
    return this.byMember.get(member);
  }

  /** 이름, 별칭, 멤버 이름 순으로 찾는다 (검증기 의존성 해석용) */
  findArgument(name: string): ArgumentDescriptor | undefined {
    return this.getArgument(name) ?? this.getMember(name);
  }

  /** prefix로 시작하는 이름/별칭을 가진 인자들 (중복 제거, 선언 순) */
  matchPrefix(prefix: string): ArgumentDescriptor[] {
    const key = nameKey(prefix, this.caseSensitive);
    const matches = new Set<ArgumentDescriptor>();
    for (const [name, descriptor] of this.byName) {
      if (name.startsWith(key)) matches.add(descriptor);
    }
    return this.descriptors.filter(d => matches.has(d));
  }

  // ─── 빌드 ───────────────────────────────────────────────────────────────

  /** 자동 인자 (이름이나 멤버가 이미 쓰였으면 생략, 별칭은 충돌하는 것만 제외) */
  private createAutomatic(kind: AutomaticArgument, names: AutomaticNames): ArgumentDescriptor | undefined {
    if (this.getArgument(names.name) || this.byMember.has(kind)) return undefined;

    const shortName =
      names.shortName !== undefined && !this.getShortArgument(names.shortName) ? names.shortName : undefined;
    return createAutomaticDescriptor(kind, {
      name: names.name,
      aliases: names.aliases.filter(alias => !this.getArgument(alias)),
      shortName,
      shortAliases: names.shortAliases.filter(alias => !this.getShortArgument(alias)),
    });
  }

  private register(descriptor: ArgumentDescriptor): void {
    if (this.byMember.has(descriptor.memberName)) {
      throw schemaError('DUPLICATE_NAME', `member '${descriptor.memberName}' is declared twice`, descriptor.name);
    }
    this.byMember.set(descriptor.memberName, descriptor);

    if (descriptor.hasLongName) {
      for (const name of [descriptor.name, ...descriptor.aliases]) {
        this.claim(this.byName, name, descriptor);
      }
    }
    const shortNames = descriptor.shortName !== undefined
      ? [descriptor.shortName, ...descriptor.shortAliases]
      : descriptor.shortAliases;
    for (const name of shortNames) {
      this.claim(this.byShortName, name, descriptor);
    }
  }

  private claim(table: Map<string, ArgumentDescriptor>, name: string, descriptor: ArgumentDescriptor): void {
    const key = nameKey(name, this.caseSensitive);
    const existing = table.get(key);
    if (existing) {
      throw schemaError(
        'DUPLICATE_NAME',
        `the name '${name}' is used by both '${existing.name}' and '${descriptor.name}'`,
        descriptor.name,
      );
    }
    table.set(key, descriptor);
  }

  private checkDependencies(): void {
    const check = (dependencies: readonly string[] | undefined, owner: string | undefined) => {
      for (const dependency of dependencies ?? []) {
        if (!this.findArgument(dependency)) {
          throw schemaError('UNKNOWN_DEPENDENCY', `validator refers to unknown argument '${dependency}'`, owner);
        }
      }
    };
    for (const descriptor of this.descriptors) {
      for (const validator of descriptor.validators) check(validator.dependencies, descriptor.name);
    }
    for (const validator of this.classValidators) check(validator.dependencies, undefined);
  }

  // ─── 캐시 ───────────────────────────────────────────────────────────────

  /** 캐시 없이 새로 빌드 */
  static build(declaration: ArgumentSetDeclaration, options: SchemaOptions): SchemaRegistry {
    return new SchemaRegistry(declaration, options);
  }
}

const schemaCache = new WeakMap<ArgumentSetDeclaration, Map<string, SchemaRegistry>>();

function cacheKey(options: SchemaOptions): string {
  return [
    options.mode,
    options.caseSensitive,
    options.nameTransform,
    options.autoHelpArgument,
    options.autoVersionArgument,
    options.nameValueSeparators.join('\u0000'),
  ].join('|');
}

/** 선언별 + 스키마 관련 옵션별 캐시 */
export function getSchema(declaration: ArgumentSetDeclaration, options: SchemaOptions): SchemaRegistry {
  let byOptions = schemaCache.get(declaration);
  if (!byOptions) {
    byOptions = new Map();
    schemaCache.set(declaration, byOptions);
  }

  const key = cacheKey(options);
  let registry = byOptions.get(key);
  if (!registry) {
    registry = SchemaRegistry.build(declaration, options);
    byOptions.set(key, registry);
  }
  return registry;
}

// ─── Internal ────────────────────────────────────────────────────────────────

function chooseConstructor(constructors: readonly ConstructorDeclaration[]): ConstructorDeclaration | undefined {
  if (constructors.length <= 1) return constructors[0];

  const designated = constructors.filter(c => c.designated);
  if (designated.length !== 1) {
    throw schemaError(
      'AMBIGUOUS_CONSTRUCTOR',
      `${constructors.length} constructors are declared; mark exactly one as designated (found ${designated.length})`,
    );
  }
  return designated[0];
}

function sortByPosition(decls: ArgumentDeclaration[]): ArgumentDeclaration[] {
  const sorted = [...decls].sort((a, b) => (a.position ?? 0) - (b.position ?? 0));
  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    const current = sorted[i];
    if (previous && current && previous.position === current.position) {
      throw schemaError(
        'DUPLICATE_POSITION',
        `'${previous.member}' and '${current.member}' share position ${current.position}`,
        current.name ?? current.member,
      );
    }
  }
  return sorted;
}

function checkPositionalOrder(positional: readonly ArgumentDescriptor[]): void {
  let optionalSeen: ArgumentDescriptor | undefined;
  positional.forEach((descriptor, index) => {
    if (descriptor.isMultiValue && index !== positional.length - 1) {
      throw schemaError(
        'MULTI_VALUE_NOT_LAST',
        'a multi-value positional argument must be the last positional argument',
        descriptor.name,
      );
    }
    if (descriptor.isRequired && optionalSeen) {
      throw schemaError(
        'REQUIRED_AFTER_OPTIONAL',
        `required positional argument follows optional argument '${optionalSeen.name}'`,
        descriptor.name,
      );
    }
    if (!descriptor.isRequired) optionalSeen = descriptor;
  });
}
