import type { ActorDefinition } from "../types.js"

/** Page size cap of the profile posts actor. */
export const PROFILE_POSTS_PAGE_LIMIT = 100

const profilePostsActor: ActorDefinition = {
  key: "profile_posts",
  platform: "linkedin",
  actorId: "LQQIXN9Othf8f7R5n",
  actorName: "apimaestro/linkedin-profile-posts",
  description: "Profile posts, no cookies needed",
  multiTarget: false,
  targetKinds: ["profile"],
  variant: "linkedin-post",
  defaultMemoryMb: 256,
  buildInput: (targets) => {
    const target = targets[0]
    return {
      username: target.value,
      limit: Math.min(target.limit, PROFILE_POSTS_PAGE_LIMIT),
      total_posts: target.limit,
    }
  },
}

export const LINKEDIN_ACTORS = [profilePostsActor] as const
