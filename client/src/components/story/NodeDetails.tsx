import { describeNode, getNodeByPath } from '@branching-stories/shared';
import { useStoryStore } from '@/store/storyStore';

export default function NodeDetails() {
  const { story, selectedPath } = useStoryStore();
  const node = story && selectedPath ? getNodeByPath(story.root, selectedPath) : null;

  if (!node) {
    return (
      <div className="detail-panel">
        <h3>Node Details</h3>
        <p className="dim">Click on a node to view its details.</p>
      </div>
    );
  }

  const details = describeNode(node);

  return (
    <div className="detail-panel">
      <h3>Node Details</h3>
      <h4>{details.title}</h4>
      <p>{details.description}</p>

      {details.achievement && (
        <div className="achievement-badge">
          <h4>🏆 {details.achievement.title}</h4>
          <p>{details.achievement.description}</p>
        </div>
      )}

      {details.footer.kind === 'options' ? (
        <>
          <p><strong>Options:</strong></p>
          <ul>
            {details.footer.options.map((option, i) => (
              <li key={i}>{option}</li>
            ))}
          </ul>
        </>
      ) : (
        <p><em>{details.footer.text}</em></p>
      )}
    </div>
  );
}
