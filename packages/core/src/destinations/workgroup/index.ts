export { WorkgroupDestination, extractWorkgroupMembers } from './workgroup_destination';
export type { WorkgroupDestinationDependencies } from './workgroup_destination';
export { WorkgroupService } from './workgroup_service';
export type { WorkgroupServiceDependencies } from './workgroup_service';
