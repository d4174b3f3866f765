import {
  AccessDeniedException,
  AuthenticationRequiredException,
  PermissionDeniedException,
} from '../../../common/exceptions';
import { AuthUser } from '../../auth/interfaces/auth-user.interface';

export type CourseAction = 'read' | 'create' | 'update' | 'delete';

/**
 * Publish state along the course -> module -> lesson path. Omitted levels
 * are not part of the resource (a course has no module flag).
 */
export interface CourseResource {
  teacherId: string;
  coursePublished: boolean;
  modulePublished?: boolean;
  lessonPublished?: boolean;
}

export interface CourseAccessRequest {
  actor: AuthUser | null;
  resource: CourseResource;
  action: CourseAction;
  hasActiveEnrollment: boolean;
}

export type CourseAccessDecision =
  | { allowed: true; via: 'owner' | 'enrollment' | 'public' }
  | { allowed: false; reason: 'authentication_required' | 'permission_denied' | 'access_denied' };

function descendantsPublished(resource: CourseResource): boolean {
  return resource.modulePublished !== false && resource.lessonPublished !== false;
}

function fullyPublished(resource: CourseResource): boolean {
  return resource.coursePublished && descendantsPublished(resource);
}

/**
 * Decides whether `actor` may perform `action` on a node of a course tree.
 * Rules are evaluated in order; the first that applies wins.
 */
export function evaluateCourseAccess(request: CourseAccessRequest): CourseAccessDecision {
  const { actor, resource, action, hasActiveEnrollment } = request;

  if (!actor) {
    if (action === 'read' && fullyPublished(resource)) {
      return { allowed: true, via: 'public' };
    }
    return { allowed: false, reason: 'authentication_required' };
  }

  if (actor.sub === resource.teacherId) {
    return { allowed: true, via: 'owner' };
  }

  if (action !== 'read') {
    return { allowed: false, reason: 'permission_denied' };
  }

  // Enrollment is a standing entitlement: the course flag is not re-checked.
  if (hasActiveEnrollment && descendantsPublished(resource)) {
    return { allowed: true, via: 'enrollment' };
  }

  if (fullyPublished(resource)) {
    return { allowed: true, via: 'public' };
  }

  return { allowed: false, reason: 'access_denied' };
}

export function assertCourseAccess(request: CourseAccessRequest): CourseAccessDecision & { allowed: true } {
  const decision = evaluateCourseAccess(request);

  if (decision.allowed) {
    return decision;
  }

  switch (decision.reason) {
    case 'authentication_required':
      throw new AuthenticationRequiredException();
    case 'permission_denied':
      throw new PermissionDeniedException('Only the course teacher can modify this content');
    case 'access_denied':
      throw new AccessDeniedException();
  }
}

/**
 * Lesson body and video are shown to the owner, to active enrollees and,
 * for free-preview lessons, to everyone who can see the lesson at all.
 */
export function canViewLessonContent(
  decision: CourseAccessDecision & { allowed: true },
  lesson: { is_free_preview: boolean },
): boolean {
  return decision.via !== 'public' || lesson.is_free_preview;
}
