/**
 * JSON Schemas for the remote payloads the core depends on.
 *
 * Only the fields the reconciliation logic reads are required; everything
 * else passes through untouched.
 */

export type QualtricsPageEnvelope = {
  result: {
    elements: unknown[];
    nextPage?: string | null;
  };
};

export const QualtricsPageEnvelopeSchema = {
  type: 'object',
  required: ['result'],
  properties: {
    result: {
      type: 'object',
      required: ['elements'],
      properties: {
        elements: { type: 'array' },
        nextPage: { type: ['string', 'null'] },
      },
    },
  },
} as const;

export type MailingListElement = {
  mailingListId: string;
  name: string;
  contactCount?: number;
  ownerId?: string;
  lastModifiedDate?: string;
  creationDate?: string;
};

export const MailingListElementSchema = {
  type: 'object',
  required: ['mailingListId', 'name'],
  properties: {
    mailingListId: { type: 'string', minLength: 1 },
    name: { type: 'string' },
    contactCount: { type: 'number' },
  },
} as const;

export type ContactElement = {
  contactId: string;
  extRef?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  email?: string | null;
};

export const ContactElementSchema = {
  type: 'object',
  required: ['contactId'],
  properties: {
    contactId: { type: 'string', minLength: 1 },
    extRef: { type: ['string', 'null'] },
  },
} as const;

export type DirectoryElement = {
  directoryId: string;
};

export const DirectoryElementSchema = {
  type: 'object',
  required: ['directoryId'],
  properties: {
    directoryId: { type: 'string', minLength: 1 },
  },
} as const;

export type WorkgroupMemberElement = {
  id: string;
  type?: string;
  name?: string;
};

export type WorkgroupDocument = {
  members: WorkgroupMemberElement[];
  administrators?: unknown[];
  description?: string | null;
  filter?: string | null;
  visibility?: string | null;
  reusable?: boolean | string | null;
};

export const WorkgroupDocumentSchema = {
  type: 'object',
  required: ['members'],
  properties: {
    members: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id'],
        properties: {
          id: { type: 'string' },
        },
      },
    },
    administrators: { type: 'array' },
  },
} as const;

export type WorkgroupSearchResponse = {
  results: Array<{ name: string }>;
};

export const WorkgroupSearchResponseSchema = {
  type: 'object',
  required: ['results'],
  properties: {
    results: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name'],
        properties: {
          name: { type: 'string' },
        },
      },
    },
  },
} as const;

export type ExportTriggerEnvelope = {
  result: { progressId: string };
};

export const ExportTriggerEnvelopeSchema = {
  type: 'object',
  required: ['result'],
  properties: {
    result: {
      type: 'object',
      required: ['progressId'],
      properties: {
        progressId: { type: 'string', minLength: 1 },
      },
    },
  },
} as const;

export type ExportProgressEnvelope = {
  result: {
    status: string;
    percentComplete: number;
    fileId?: string | null;
  };
};

export const ExportProgressEnvelopeSchema = {
  type: 'object',
  required: ['result'],
  properties: {
    result: {
      type: 'object',
      required: ['status', 'percentComplete'],
      properties: {
        status: { type: 'string' },
        percentComplete: { type: 'number' },
        fileId: { type: ['string', 'null'] },
      },
    },
  },
} as const;

export type ProfileSearchResponse = {
  values?: Array<Record<string, unknown>>;
  totalCount?: number;
};

export const ProfileSearchResponseSchema = {
  type: 'object',
  properties: {
    values: { type: 'array', items: { type: 'object' } },
    totalCount: { type: 'number' },
  },
} as const;

export type OrgResponse = {
  alias?: string;
  name?: string;
};

export const OrgResponseSchema = {
  type: 'object',
  properties: {
    alias: { type: 'string' },
    name: { type: 'string' },
  },
} as const;

export type QuestionEnvelope = {
  result: Record<string, unknown>;
};

export const QuestionEnvelopeSchema = {
  type: 'object',
  required: ['result'],
  properties: {
    result: { type: 'object' },
  },
} as const;

export type QuestionListEnvelope = {
  result: { elements: Array<Record<string, unknown>> };
};

export const QuestionListEnvelopeSchema = {
  type: 'object',
  required: ['result'],
  properties: {
    result: {
      type: 'object',
      required: ['elements'],
      properties: {
        elements: { type: 'array', items: { type: 'object' } },
      },
    },
  },
} as const;
