import { CompletionState, CompletionTracking, UrlDisplay, type CourseModuleInfo, type RequestContext } from './types';
import { AuthorizationError, NotFoundError } from './errors';
import { allowedModalModules } from './modal';
import { getModResourceFile, getModResourceIconName, pluginFileUrl } from './resourceFiles';
import { checkModifyEmbeddedUrl, urlFinalDisplayType } from './urlDisplay';

export const VIEW_HIDDEN_CAPABILITY = 'moodle/course:viewhiddenactivities';

function isCompleteState(state: number | null): boolean {
  return state === CompletionState.COMPLETE || state === CompletionState.COMPLETE_PASS;
}

/**
 * Everything the tile script needs to decide how to open an activity:
 * completion state, resource type and whether it may be shown in a modal.
 * Returns null when the activity exists but is hidden from this user.
 */
export async function getCourseModInfo(ctx: RequestContext, courseId: number, cmid: number): Promise<CourseModuleInfo | null> {
  const { catalog } = ctx;
  const course = await catalog.getCourse(courseId);
  if (!course) throw new NotFoundError('Course', courseId);
  const cm = await catalog.getCourseModule(courseId, cmid);
  if (!cm) throw new NotFoundError('Course module', cmid);

  const viewCap = `mod/${cm.modname}:view`;
  if (!(await catalog.hasCapability(viewCap, course.contextId))) throw new AuthorizationError(viewCap);

  const userVisible = cm.visible || await catalog.hasCapability(VIEW_HIDDEN_CAPABILITY, course.contextId);
  if (!userVisible) return null;

  let completionState: number | null = null;
  const tracked = cm.completion !== CompletionTracking.NONE && course.completionEnabled && !ctx.user.isGuest;
  if (tracked) {
    completionState = (await catalog.getCompletionState(cm.id)) ?? CompletionState.INCOMPLETE;
  }

  const isResource = cm.modname === 'resource';
  const allowed = await allowedModalModules(ctx);
  const resourceType = isResource ? (await getModResourceIconName(ctx, cm.contextId)) ?? '' : '';

  let modalAllowed = (!!resourceType && allowed.resources.includes(resourceType))
    || allowed.resources.includes(cm.modname)
    || allowed.modules.includes(cm.modname);

  let fileUrl = '';
  if (isResource) {
    const file = await getModResourceFile(ctx, cm.contextId);
    fileUrl = file ? pluginFileUrl(ctx.wwwroot, file) : '';
  }

  if (modalAllowed && cm.modname === 'url') {
    const url = await catalog.getUrlRecord(cm.instance);
    if (!url) throw new NotFoundError('URL', cm.instance);
    // Only embedded links can go in a modal
    if (urlFinalDisplayType(url, ctx.wwwroot) !== UrlDisplay.EMBED) modalAllowed = false;
    fileUrl = checkModifyEmbeddedUrl(url.externalUrl) || url.externalUrl;
  }

  return {
    id: cm.id,
    courseId,
    moduleContextId: cm.contextId,
    courseContextId: course.contextId,
    name: cm.name,
    modname: cm.modname,
    sectionNumber: cm.sectionNumber,
    sectionId: cm.sectionId,
    completionEnabled: tracked,
    completionState,
    isComplete: isCompleteState(completionState),
    isManualCompletion: cm.completion === CompletionTracking.MANUAL,
    resourceType,
    pluginFileUrl: fileUrl,
    modalAllowed,
  };
}
