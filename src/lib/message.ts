import { InvalidDescriptorError } from "./errors";
import { isCommitType, type CommitDescriptor } from "../types/commit";

const FIELDS = ["type", "scope", "theme", "intro"] as const;

/**
 * Throws if a field is blank or the type is outside the taxonomy
 */
export function validateDescriptor(descriptor: CommitDescriptor): void {
  for (const field of FIELDS) {
    if (!descriptor[field].trim()) {
      throw new InvalidDescriptorError(field);
    }
  }
  if (!isCommitType(descriptor.type)) {
    throw new InvalidDescriptorError("type");
  }
}

/**
 * `type(scope): theme`
 */
export function formatHeader({ type, scope, theme }: CommitDescriptor): string {
  return `${type}(${scope}): ${theme}`;
}

export function formatBody({ type, scope, theme, intro }: CommitDescriptor): string {
  return [`类型: ${type}`, `作用域: ${scope}`, `主题: ${theme}`, `简介: ${intro}`].join("\n");
}

export interface CommitMessage {
  header: string;
  body: string;
}

export function formatCommitMessage(descriptor: CommitDescriptor): CommitMessage {
  validateDescriptor(descriptor);
  return {
    header: formatHeader(descriptor),
    body: formatBody(descriptor),
  };
}
