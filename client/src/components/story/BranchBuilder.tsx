import { useEffect, useState, type FormEvent } from 'react';
import {
  DEFAULT_BRANCH_LENGTH,
  MAX_BRANCH_LENGTH,
  MIN_BRANCH_LENGTH,
  defaultBranchInstructions,
  getNodeByPath,
  parsePath,
  type BranchEnding,
  type BranchMode,
} from '@branching-stories/shared';
import { selectedKey, useStoryStore } from '@/store/storyStore';

// Destination select values: an ending kind, or "node:<pathKey>" to merge
type Destination = 'alternate' | 'open' | `node:${string}`;

const NODE_PREFIX = 'node:';

function toEnding(destination: Destination): BranchEnding | null {
  if (destination === 'alternate' || destination === 'open') {
    return { kind: destination };
  }
  const targetPath = parsePath(destination.slice(NODE_PREFIX.length));
  return targetPath ? { kind: 'merge', targetPath } : null;
}

function toDestination(value: string): Destination {
  if (value === 'alternate' || value === 'open') return value;
  return `node:${value.slice(NODE_PREFIX.length)}`;
}

export default function BranchBuilder() {
  const { story, outline, validation, isLoading, addBranches } = useStoryStore();
  const selected = useStoryStore(selectedKey);

  const [sourceKey, setSourceKey] = useState('');
  const [destination, setDestination] = useState<Destination>('alternate');
  const [branchLength, setBranchLength] = useState(DEFAULT_BRANCH_LENGTH);
  const [achievements, setAchievements] = useState(true);
  const [mode, setMode] = useState<BranchMode>('single');
  const [instructions, setInstructions] = useState('');
  const [instructionsEdited, setInstructionsEdited] = useState(false);

  // Clicking a node in the tree makes it the source
  useEffect(() => {
    if (selected !== null) {
      setSourceKey(selected);
    }
  }, [selected]);

  const ending = toEnding(destination);
  const sourcePath = parsePath(sourceKey);
  const source = story && sourcePath ? getNodeByPath(story.root, sourcePath) : null;
  const target = story && ending?.kind === 'merge' ? getNodeByPath(story.root, ending.targetPath) : null;

  const suggested =
    source && ending ? defaultBranchInstructions(source.name, mode, ending.kind, target?.name) : '';

  useEffect(() => {
    if (!instructionsEdited) {
      setInstructions(suggested);
    }
  }, [suggested, instructionsEdited]);

  if (!story) return null;

  const handleSubmit = async (event: FormEvent) => {
    event.preventDefault();
    if (!sourcePath || !ending) return;

    const added = await addBranches({
      sourcePath,
      ending,
      branchLength,
      mode,
      achievements,
      instructions: instructions.trim() || undefined,
    });
    if (added) {
      setInstructionsEdited(false);
    }
  };

  return (
    <form className="panel branch-builder" onSubmit={handleSubmit}>
      <h3>Add Branches</h3>

      <div className="field-row">
        <label>
          Source node
          <select value={sourceKey} onChange={(e) => setSourceKey(e.target.value)}>
            {outline.map((entry) => (
              <option key={entry.pathKey} value={entry.pathKey}>{entry.label}</option>
            ))}
          </select>
        </label>

        <label>
          Destination
          <select
            value={destination}
            onChange={(e) => setDestination(toDestination(e.target.value))}
          >
            <option value="alternate">Create alternate ending</option>
            <option value="open">Leave open</option>
            {outline.map((entry) => (
              <option key={entry.pathKey} value={`${NODE_PREFIX}${entry.pathKey}`}>
                Merge into: {entry.label}
              </option>
            ))}
          </select>
        </label>
      </div>

      <label>
        Branch length: {branchLength} nodes
        <input
          type="range"
          min={MIN_BRANCH_LENGTH}
          max={MAX_BRANCH_LENGTH}
          value={branchLength}
          onChange={(e) => setBranchLength(Number(e.target.value))}
        />
      </label>

      <label className="checkbox">
        <input
          type="checkbox"
          checked={achievements}
          onChange={(e) => setAchievements(e.target.checked)}
        />
        Include achievements
      </label>

      <fieldset className="radio-group">
        <legend>Branches</legend>
        <label>
          <input type="radio" name="mode" checked={mode === 'single'} onChange={() => setMode('single')} />
          Single branch
        </label>
        <label>
          <input type="radio" name="mode" checked={mode === 'multiple'} onChange={() => setMode('multiple')} />
          Multiple options
        </label>
      </fieldset>

      <label>
        Instructions
        <textarea
          rows={3}
          value={instructions}
          onChange={(e) => {
            setInstructions(e.target.value);
            setInstructionsEdited(true);
          }}
        />
      </label>

      {validation && !validation.valid && (
        <ul className="validation-errors">
          {validation.errors.map((error) => (
            <li key={error}>{error}</li>
          ))}
        </ul>
      )}

      <button type="submit" disabled={isLoading || !source || !ending}>
        {mode === 'single' ? 'Add Branch' : 'Add Branches'}
      </button>
    </form>
  );
}
