import type {
  AddChildrenRequest,
  ChildInputType,
  ChildPosition,
  ChildSpec,
  DeleteRequest,
  SetChildrenRequest,
  SetValueRequest
} from "../types.js";

export interface SetValueOptions {
  /** Desired value; null clears the text (or empties the attribute) */
  value: string | null;
  /** Attribute to set instead of the element text */
  attribute?: string;
}

export interface AddChildrenOptions {
  children: ChildSpec;
  /** How string entries are read (defaults to yaml) */
  inputType?: ChildInputType;
  /** Append inside the target, or insert as siblings */
  position?: ChildPosition;
}

export interface SetChildrenOptions {
  children: ChildSpec;
  inputType?: ChildInputType;
}

function remove(): DeleteRequest {
  return { kind: "delete" };
}

function setValue(options: SetValueOptions): SetValueRequest {
  return {
    kind: "setValue",
    value: options.value,
    attribute: options.attribute
  };
}

function addChildren(options: AddChildrenOptions): AddChildrenRequest {
  return {
    kind: "addChildren",
    children: options.children,
    inputType: options.inputType ?? "yaml",
    position: options.position ?? "append"
  };
}

function setChildren(options: SetChildrenOptions): SetChildrenRequest {
  return {
    kind: "setChildren",
    children: options.children,
    inputType: options.inputType ?? "yaml"
  };
}

export const xmlMutation = {
  delete: remove,
  setValue,
  addChildren,
  setChildren
};
