export type GroupType = "train" | "val";

export const group_types = ["train", "val"] satisfies Array<GroupType>;
