export interface SkuAssignment {
  skuId: string;
  disabledPlans: string[];
}

export interface ServicePlanInfo {
  servicePlanId: string;
  servicePlanName: string;
}

export interface SubscribedSku {
  skuId: string;
  skuPartNumber: string;
  servicePlans: ServicePlanInfo[];
}

export interface DirectoryUser {
  id: string;
  userPrincipalName: string;
  displayName: string | null;
  assignedLicenses: SkuAssignment[];
}

export interface DirectoryClient {
  authenticate(): Promise<void>;
  listSubscribedSkus(): Promise<SubscribedSku[]>;
  getUser(userId: string): Promise<DirectoryUser>;
  assignLicenses(userId: string, addLicenses: SkuAssignment[], removeLicenses: string[]): Promise<void>;
}
