import { ROLES, Role } from '../types.js';
import { unauthorized } from '../errors.js';

export function isRole(value: string): value is Role {
    return (ROLES as readonly string[]).includes(value);
}

function assertNever(value: never): never {
    throw new Error(`Unhandled role: ${String(value)}`);
}

export function canManageBets(role: Role): boolean {
    switch (role) {
        case 'Admin':
            return true;
        case 'Member':
            return false;
        default:
            return assertNever(role);
    }
}

export function canPredict(role: Role): boolean {
    switch (role) {
        case 'Admin':
        case 'Member':
            return true;
        default:
            return assertNever(role);
    }
}

export function requireAdmin(actor: { role: Role }, action: string): void {
    if (!canManageBets(actor.role)) {
        throw unauthorized(`Only admins can ${action}`);
    }
}
