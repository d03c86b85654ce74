export interface GraphApiErrorResponse {
  statusCode?: number;
  code?: string;
  body?: unknown;
  requestId?: string;
  innerError?: unknown;
  response?: {
    status?: number;
    headers?: Headers | Record<string, string>;
  };
}

export function isGraphApiError(error: unknown): error is GraphApiErrorResponse {
  return (
    typeof error === 'object' &&
    error !== null &&
    ('statusCode' in error || 'code' in error || 'body' in error || 'requestId' in error)
  );
}

export interface GraphApiResponse<T> {
  '@odata.context'?: string;
  '@odata.nextLink'?: string;
  value: T[];
}

export interface GraphIdentity {
  id?: string;
  displayName?: string;
  email?: string;
}

// Typing built from the response of the MS Graph API
export interface IdentitySet {
  user?: GraphIdentity;
  group?: GraphIdentity;
  siteGroup?: GraphIdentity;
  siteUser?: GraphIdentity & { loginName?: string };
}

// Typing built from the response of the MS Graph API, only the fields read by the indexer
export interface DriveItem {
  id: string;
  name: string;
  webUrl?: string;
  size?: number;
  createdDateTime?: string;
  lastModifiedDateTime?: string;
  createdBy?: IdentitySet;
  lastModifiedBy?: IdentitySet;
  fileSystemInfo?: {
    createdDateTime?: string;
    lastModifiedDateTime?: string;
  };
  folder?: {
    childCount?: number;
  };
  file?: {
    mimeType?: string;
  };
}

// Permissions are left loosely typed: the indexer reads roles and identities from whatever Graph returns.
// grantedToIdentities is deprecated by Graph but still filled for older sharing links.
export interface SimplePermission {
  id?: string;
  roles?: string[];
  grantedToV2?: IdentitySet;
  grantedToIdentitiesV2?: IdentitySet[];
  grantedToIdentities?: IdentitySet[];
}

export interface Site {
  id?: string;
  name?: string;
  webUrl?: string;
}

export interface Drive {
  id?: string;
  name?: string;
  driveType?: string;
}

export interface SitePage {
  id?: string;
  name?: string;
  title?: string;
  webUrl?: string;
  createdDateTime?: string;
  lastModifiedDateTime?: string;
  createdBy?: IdentitySet;
  lastModifiedBy?: IdentitySet;
}

export interface WebPart {
  '@odata.type'?: string;
  id?: string;
  innerHtml?: string;
}

export interface CanvasColumn {
  id?: string;
  webparts?: WebPart[];
}

export interface CanvasLayout {
  horizontalSections?: { id?: string; columns?: CanvasColumn[] }[];
  verticalSection?: { webparts?: WebPart[] };
}

export interface SitePageWithCanvas extends SitePage {
  canvasLayout?: CanvasLayout;
}
