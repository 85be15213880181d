// Response shapes of the remote Web API, restricted to the fields in use

export type HttpMethod = 'GET' | 'POST';

export type RequestParams = Record<string, string | number | boolean | undefined>;

export interface TransportResponse {
  status: number;
  body: string;
}

export interface Paging {
  pageIndex: number;
  pageSize: number;
  total: number;
}

export interface SystemStatus {
  id: string;
  version: string;
  status: string;
}

export interface NavigationGlobal {
  edition?: string;
}

export interface ProjectData {
  key: string;
  name: string;
  qualifier?: string;
  visibility?: string;
  lastAnalysisDate?: string;
}

export interface ProjectSearchResponse {
  paging: Paging;
  components: ProjectData[];
}

export interface BranchData {
  name: string;
  isMain: boolean;
  type?: string;
  analysisDate?: string;
}

export interface BranchListResponse {
  branches: BranchData[];
}

export interface PullRequestData {
  key: string;
  title?: string;
  branch?: string;
  analysisDate?: string;
}

export interface PullRequestListResponse {
  pullRequests: PullRequestData[];
}

export interface QualityGateData {
  id?: string | number;
  name: string;
  isDefault?: boolean;
  isBuiltIn?: boolean;
}

export interface QualityGateListResponse {
  qualitygates: QualityGateData[];
}

export interface QualityGateCondition {
  id: string | number;
  metric: string;
  op: string;
  error: string;
}

export interface QualityGateShowResponse {
  name: string;
  conditions?: QualityGateCondition[];
}

export interface QualityGateProjectsResponse {
  paging: Paging;
  results: Array<{ key: string; name?: string; selected?: boolean }>;
}

export interface QualityGateByProjectResponse {
  qualityGate: { name: string; default?: boolean };
}

export interface QualityProfileData {
  key: string;
  name: string;
  language: string;
  languageName?: string;
  isInherited?: boolean;
  parentKey?: string;
  parentName?: string;
  isDefault?: boolean;
  isBuiltIn?: boolean;
  activeRuleCount?: number;
  activeDeprecatedRuleCount?: number;
  projectCount?: number;
  rulesUpdatedAt?: string;
  lastUsed?: string;
}

export interface QualityProfileSearchResponse {
  profiles: QualityProfileData[];
}

export interface ActiveRuleData {
  qProfile: string;
  severity: string;
  inherit?: string;
  params?: Array<{ key: string; value: string }>;
}

export interface RuleSearchResponse {
  total: number;
  p: number;
  ps: number;
  rules: Array<{ key: string }>;
  actives?: Record<string, ActiveRuleData[]>;
}

export interface PortfolioSearchResponse {
  paging: Paging;
  components: Array<{ key: string; name: string; qualifier?: string; visibility?: string }>;
}

export interface PortfolioShowData {
  key: string;
  name: string;
  desc?: string;
  qualifier?: string;
  visibility?: string;
  originalKey?: string;
  selectionMode?: string;
  regexp?: string;
  tags?: string[];
  branch?: string;
  selectedProjects?: Array<{ projectKey: string; selectedBranches?: string[] }>;
  subViews?: PortfolioShowData[];
}

export interface MeasuresResponse {
  component: { key: string; measures: Array<{ metric: string; value?: string }> };
}

export interface ComponentSearchResponse {
  paging: Paging;
  components: Array<{ key: string; name: string; qualifier?: string; visibility?: string }>;
}

export interface ApplicationShowResponse {
  application: {
    key: string;
    name: string;
    description?: string;
    visibility?: string;
    projects?: Array<{ key: string }>;
  };
}

export interface GroupData {
  id?: string | number;
  name: string;
  description?: string;
  membersCount?: number;
  default?: boolean;
}

export interface GroupSearchResponse {
  paging: Paging;
  groups: GroupData[];
}

export interface UserData {
  login: string;
  name?: string;
  email?: string;
  active?: boolean;
  local?: boolean;
  lastConnectionDate?: string;
  groups?: string[];
}

export interface UserSearchResponse {
  paging: Paging;
  users: UserData[];
}

export interface UserTokenData {
  name: string;
  createdAt: string;
  lastConnectionDate?: string;
}

export interface UserTokenSearchResponse {
  login: string;
  userTokens: UserTokenData[];
}

export interface CeTaskData {
  id: string;
  type: string;
  status: string;
  componentKey?: string;
  submittedAt?: string;
  executedAt?: string;
  scannerContext?: string;
}

export interface CeActivityResponse {
  tasks: CeTaskData[];
}

export interface CeTaskResponse {
  task: CeTaskData;
}

export interface ApiErrorBody {
  errors?: Array<{ msg: string }>;
}

export interface PermissionUsersResponse {
  paging: Paging;
  users: Array<{ login: string; permissions: string[] }>;
}

export interface PermissionGroupsResponse {
  paging: Paging;
  groups: Array<{ name: string; permissions: string[] }>;
}
