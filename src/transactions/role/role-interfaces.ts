export interface RoleSetManagerData {
    principal: string;
    enabled: boolean;
}
